import * as E from 'fp-ts/lib/Either'
import { pipe } from 'fp-ts/lib/function'
import * as TE from 'fp-ts/lib/TaskEither'
import * as Path from 'path'

import * as fs from './fs'
import { Fetcher, fetchBytes, FetchResult } from './http'
import * as img from './imageProcessing'
import {
  deadLinkSentinel,
  decodeFailure,
  DownloadFailure,
  encodeFailure,
  filesystemFailure,
  httpStatusFailure,
  transformFailure,
  transportFailure,
} from './models/DownloadFailure'

// Some hosts answer 200 with this placeholder instead of a 404.
const REMOVED_IMAGE_MARKER = 'removed.png'

export interface ImageFetcherOptions {
  /** Shorter-edge size of the square output; `<= 0` keeps the source size. */
  targetSize: number
  fetcher?: Fetcher
}

export interface SavedImage {
  path: string
  size: img.Size
}

export interface ImageFetcher {
  readonly targetSize: number
  attempt: (
    url: string,
    destinationPath: string,
  ) => TE.TaskEither<DownloadFailure, SavedImage>
  /** Resolves to `false` on any failure; never rejects. */
  download: (url: string, destinationPath: string) => Promise<boolean>
}

const validateResponse = (
  response: FetchResult,
): E.Either<DownloadFailure, FetchResult> =>
  response.statusCode !== 200
    ? E.left(httpStatusFailure(response.statusCode))
    : response.finalUrl.includes(REMOVED_IMAGE_MARKER)
    ? E.left(deadLinkSentinel(response.finalUrl))
    : E.right(response)

const transform = (targetSize: number) => (
  image: img.ImageBuffer,
): TE.TaskEither<DownloadFailure, img.ImageBuffer> =>
  targetSize > 0
    ? pipe(img.cropResize(targetSize)(image), TE.mapLeft(transformFailure))
    : TE.right(image)

const encodeFor = (destinationPath: string) => (
  image: img.ImageBuffer,
): TE.TaskEither<DownloadFailure, Buffer> =>
  pipe(
    img.formatFromPath(destinationPath),
    TE.fromEither,
    TE.chain((format) => img.encodeImage(format)(image)),
    TE.mapLeft(encodeFailure),
  )

const save = (
  destinationPath: string,
  bytes: Buffer,
): TE.TaskEither<DownloadFailure, void> =>
  pipe(
    fs.ensureDir(Path.dirname(destinationPath)),
    TE.chain(() => fs.writeFile(destinationPath, bytes)),
    TE.mapLeft(filesystemFailure),
  )

export const imageFetcher = ({
  targetSize,
  fetcher = fetchBytes(),
}: ImageFetcherOptions): ImageFetcher => {
  const attempt = (
    url: string,
    destinationPath: string,
  ): TE.TaskEither<DownloadFailure, SavedImage> =>
    pipe(
      fetcher(url),
      TE.mapLeft(transportFailure),
      TE.chainEitherK(validateResponse),
      TE.chain(({ body }) =>
        pipe(img.decodeRGB(body), TE.mapLeft(decodeFailure)),
      ),
      TE.chain(transform(targetSize)),
      TE.chain((image) =>
        pipe(
          encodeFor(destinationPath)(image),
          TE.chain((bytes) => save(destinationPath, bytes)),
          TE.map(
            (): SavedImage => ({
              path: destinationPath,
              size: { width: image.info.width, height: image.info.height },
            }),
          ),
        ),
      ),
    )

  const download = (url: string, destinationPath: string): Promise<boolean> =>
    pipe(
      attempt(url, destinationPath),
      TE.match(
        () => false,
        () => true,
      ),
    )()

  return { targetSize, attempt, download }
}
