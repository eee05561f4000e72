import * as E from 'fp-ts/lib/Either'
import { pipe } from 'fp-ts/lib/function'
import * as J from 'fp-ts/lib/Json'
import * as TE from 'fp-ts/lib/TaskEither'
import * as D from 'io-ts/lib/Decoder'
import * as os from 'os'
import ora from 'ora'
import * as Path from 'path'

import { runBatch } from './batch'
import * as fs from './fs'
import { fetchBytes } from './http'
import { ImageFetcher, imageFetcher } from './imageFetcher'
import { CLIArguments } from './models/CLIArguments'
import { describeFailure } from './models/DownloadFailure'
import { Manifest, ManifestEntry } from './models/Manifest'
import { Natural } from './models/Natural'
import * as reporting from './reporting'

export { imageFetcher } from './imageFetcher'
export type {
  ImageFetcher,
  ImageFetcherOptions,
  SavedImage,
} from './imageFetcher'
export { fetchBytes } from './http'
export type { Fetcher, FetchResult } from './http'
export { describeFailure } from './models/DownloadFailure'
export type { DownloadFailure } from './models/DownloadFailure'
export { runBatch } from './batch'
export type { BatchReport } from './batch'

const decodeWith = <A>(decoder: D.Decoder<unknown, A>) => (
  input: unknown,
): E.Either<Error, A> =>
  pipe(
    decoder.decode(input),
    E.mapLeft((errors) => new Error(D.draw(errors))),
  )

export const decodeArguments = decodeWith(CLIArguments)

// One download per core unless asked otherwise.
const defaultConcurrency = (): E.Either<Error, Natural> =>
  decodeWith(Natural)(Math.max(1, os.cpus().length))

// Relative entry paths are taken from the manifest's own directory.
export const readManifest = (
  manifestPath: string,
): TE.TaskEither<Error, ReadonlyArray<ManifestEntry>> => {
  const baseDir = Path.dirname(Path.resolve(manifestPath))
  return pipe(
    fs.readTextFile(manifestPath),
    TE.chainEitherK((text) =>
      pipe(
        J.parse(text),
        E.mapLeft(
          (err) =>
            new Error(
              `Invalid manifest ${manifestPath}: ${E.toError(err).message}`,
            ),
        ),
      ),
    ),
    TE.chainEitherK(decodeWith(Manifest)),
    TE.map((entries) =>
      entries.map((entry) => ({
        url: entry.url,
        path: Path.resolve(baseDir, entry.path),
      })),
    ),
  )
}

const downloadOne = (
  fetcher: ImageFetcher,
  url: string,
  output: string,
): TE.TaskEither<Error, void> =>
  pipe(
    TE.rightIO<Error, ora.Ora>(reporting.startFetching(url)),
    TE.chain((spinner) =>
      pipe(
        fetcher.attempt(url, output),
        TE.mapLeft(
          (failure) => new Error(`${url}: ${describeFailure(failure)}`),
        ),
        TE.orElseFirstIOK(() => reporting.clearSpinner(spinner)),
        TE.chainIOK((saved) => reporting.reportSaved(spinner, saved)),
      ),
    ),
  )

// Failed entries are reported but do not fail the run.
const downloadManifest = (
  fetcher: ImageFetcher,
  manifestPath: string,
  concurrency: Natural,
  skipExisting: boolean,
): TE.TaskEither<Error, void> =>
  pipe(
    readManifest(manifestPath),
    TE.chainW((entries) =>
      pipe(
        TE.rightIO(reporting.createBatchProgress(entries.length)),
        TE.chain((bar) =>
          TE.rightTask(
            runBatch(fetcher, entries, {
              concurrency,
              skipExisting,
              tick: reporting.tickProgress(bar),
            }),
          ),
        ),
      ),
    ),
    TE.chainIOK(reporting.reportBatch),
  )

export function main(cliArguments: unknown): TE.TaskEither<Error, void> {
  return pipe(
    TE.fromEither(decodeArguments(cliArguments)),
    TE.chain((args): TE.TaskEither<Error, void> => {
      const fetcher = imageFetcher({
        targetSize: args.size,
        fetcher: fetchBytes({ timeoutMs: args.timeout }),
      })

      if (args.manifest !== undefined) {
        const manifest = args.manifest
        const concurrency: E.Either<Error, Natural> =
          args.concurrency === undefined
            ? defaultConcurrency()
            : E.right(args.concurrency)
        return pipe(
          TE.fromEither(concurrency),
          TE.chain((workers) =>
            downloadManifest(
              fetcher,
              manifest,
              workers,
              args.skipExisting ?? false,
            ),
          ),
        )
      }
      if (args.url !== undefined && args.output !== undefined) {
        return downloadOne(fetcher, args.url, Path.resolve(args.output))
      }
      return TE.left(
        new Error('Either --manifest or both --url and --output are required'),
      )
    }),
  )
}
