import { pipe } from 'fp-ts/lib/function'
import * as IO from 'fp-ts/lib/IO'
import ora from 'ora'
import ProgressBar from 'progress'

import { BatchReport, FailedEntry } from './batch'
import { SavedImage } from './imageFetcher'
import { describeFailure } from './models/DownloadFailure'

export const savedMessage = ({ path, size }: SavedImage): string =>
  `Saved ${path} (${size.width}x${size.height})`

export const failedEntryMessage = ({ entry, failure }: FailedEntry): string =>
  `${entry.url}: ${describeFailure(failure)}`

export const batchSummary = (report: BatchReport): string =>
  [
    `Saved ${report.saved}`,
    `skipped ${report.skipped}`,
    `failed ${report.failed.length}`,
  ].join(', ')

export const startFetching = (url: string): IO.IO<ora.Ora> =>
  pipe(
    () => ora(`Fetching ${url}`),
    IO.map((spinner) => spinner.start()),
  )

export const reportSaved = (
  spinner: ora.Ora,
  saved: SavedImage,
): IO.IO<void> => () => {
  spinner.succeed(savedMessage(saved))
}

// The caller reports the error itself, so the spinner only has to go away.
export const clearSpinner = (spinner: ora.Ora): IO.IO<void> => () => {
  spinner.stop()
}

export const reportError = (err: Error): IO.IO<void> => () => {
  ora().fail(err.message)
}

export const createBatchProgress = (
  total: number,
): IO.IO<ProgressBar> => () =>
  new ProgressBar('Fetching images [:bar] :current/:total', {
    total,
    width: 17,
  })

export const tickProgress = (bar: ProgressBar): IO.IO<void> => () => {
  bar.tick()
}

export const reportBatch = (report: BatchReport): IO.IO<void> => () => {
  const spinner = ora()
  report.failed.forEach((failed) => spinner.fail(failedEntryMessage(failed)))
  if (report.failed.length > 0) {
    spinner.warn(batchSummary(report))
  } else {
    spinner.succeed(batchSummary(report))
  }
}
