import * as E from 'fp-ts/lib/Either'
import * as TE from 'fp-ts/lib/TaskEither'

export interface FetchResult {
  statusCode: number
  /** URL the response was served from, after redirects. */
  finalUrl: string
  body: Buffer
}

export type Fetcher = (url: string) => TE.TaskEither<Error, FetchResult>

export interface FetchOptions {
  timeoutMs?: number
}

export const fetchBytes = ({ timeoutMs }: FetchOptions = {}): Fetcher => (
  url,
) =>
  TE.tryCatch(
    () =>
      fetch(url, {
        redirect: 'follow',
        signal:
          timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs),
      }).then((response) =>
        response.arrayBuffer().then((body) => ({
          statusCode: response.status,
          finalUrl: response.url,
          body: Buffer.from(body),
        })),
      ),
    E.toError,
  )
