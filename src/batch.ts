import { pipe } from 'fp-ts/lib/function'
import * as IO from 'fp-ts/lib/IO'
import * as RA from 'fp-ts/lib/ReadonlyArray'
import * as T from 'fp-ts/lib/Task'
import * as TE from 'fp-ts/lib/TaskEither'

import * as fs from './fs'
import { ImageFetcher } from './imageFetcher'
import { ManifestEntry } from './models/Manifest'
import { DownloadFailure } from './models/DownloadFailure'
import { Natural } from './models/Natural'

export interface BatchOptions {
  concurrency: Natural
  skipExisting: boolean
  tick: IO.IO<void>
}

export interface FailedEntry {
  entry: ManifestEntry
  failure: DownloadFailure
}

export interface BatchReport {
  saved: number
  skipped: number
  failed: ReadonlyArray<FailedEntry>
}

type EntryOutcome =
  | { _tag: 'Saved' }
  | { _tag: 'Skipped' }
  | { _tag: 'Failed'; failed: FailedEntry }

const saved: EntryOutcome = { _tag: 'Saved' }
const skipped: EntryOutcome = { _tag: 'Skipped' }

const fetchEntry = (fetcher: ImageFetcher) => (
  entry: ManifestEntry,
): T.Task<EntryOutcome> =>
  pipe(
    fetcher.attempt(entry.url, entry.path),
    TE.match(
      (failure): EntryOutcome => ({
        _tag: 'Failed',
        failed: { entry, failure },
      }),
      () => saved,
    ),
  )

const processEntry = (fetcher: ImageFetcher, options: BatchOptions) => (
  entry: ManifestEntry,
): T.Task<EntryOutcome> =>
  pipe(
    options.skipExisting ? fs.exists(entry.path) : T.of(false),
    T.chain((alreadySaved) =>
      alreadySaved ? T.of(skipped) : fetchEntry(fetcher)(entry),
    ),
    T.chainFirst(() => T.fromIO(options.tick)),
  )

const toReport = (outcomes: ReadonlyArray<EntryOutcome>): BatchReport =>
  outcomes.reduce<BatchReport>(
    (report, outcome) => {
      switch (outcome._tag) {
        case 'Saved':
          return { ...report, saved: report.saved + 1 }
        case 'Skipped':
          return { ...report, skipped: report.skipped + 1 }
        case 'Failed':
          return { ...report, failed: [...report.failed, outcome.failed] }
      }
    },
    { saved: 0, skipped: 0, failed: [] },
  )

export const runBatch = (
  fetcher: ImageFetcher,
  entries: ReadonlyArray<ManifestEntry>,
  options: BatchOptions,
): T.Task<BatchReport> => {
  const processOne = processEntry(fetcher, options)
  // Entries within a chunk run in parallel, chunks run one after another, so
  // at most `concurrency` downloads are in flight. A failed entry never stops
  // the batch.
  return pipe(
    entries,
    RA.chunksOf(options.concurrency),
    RA.map((chunk) => T.sequenceArray(chunk.map(processOne))),
    T.sequenceSeqArray,
    T.map(RA.flatten),
    T.map(toReport),
  )
}
