export type DownloadFailure =
  | { readonly _tag: 'TransportFailure'; readonly error: Error }
  | { readonly _tag: 'HttpStatusFailure'; readonly statusCode: number }
  | { readonly _tag: 'DeadLinkSentinel'; readonly finalUrl: string }
  | { readonly _tag: 'DecodeFailure'; readonly error: Error }
  | { readonly _tag: 'TransformFailure'; readonly error: Error }
  | { readonly _tag: 'EncodeFailure'; readonly error: Error }
  | { readonly _tag: 'FilesystemFailure'; readonly error: Error }

export const transportFailure = (error: Error): DownloadFailure => ({
  _tag: 'TransportFailure',
  error,
})

export const httpStatusFailure = (statusCode: number): DownloadFailure => ({
  _tag: 'HttpStatusFailure',
  statusCode,
})

export const deadLinkSentinel = (finalUrl: string): DownloadFailure => ({
  _tag: 'DeadLinkSentinel',
  finalUrl,
})

export const decodeFailure = (error: Error): DownloadFailure => ({
  _tag: 'DecodeFailure',
  error,
})

export const transformFailure = (error: Error): DownloadFailure => ({
  _tag: 'TransformFailure',
  error,
})

export const encodeFailure = (error: Error): DownloadFailure => ({
  _tag: 'EncodeFailure',
  error,
})

export const filesystemFailure = (error: Error): DownloadFailure => ({
  _tag: 'FilesystemFailure',
  error,
})

export const describeFailure = (failure: DownloadFailure): string => {
  switch (failure._tag) {
    case 'HttpStatusFailure':
      return `unexpected HTTP status ${failure.statusCode}`
    case 'DeadLinkSentinel':
      return `image was removed (resolved to ${failure.finalUrl})`
    case 'TransportFailure':
      return `request failed: ${failure.error.message}`
    case 'DecodeFailure':
      return `could not decode image: ${failure.error.message}`
    case 'TransformFailure':
      return `could not resize image: ${failure.error.message}`
    case 'EncodeFailure':
      return `could not encode image: ${failure.error.message}`
    case 'FilesystemFailure':
      return `could not write image: ${failure.error.message}`
  }
}
