import { pipe } from 'fp-ts/lib/function'
import * as D from 'io-ts/lib/Decoder'
import { Natural } from './Natural'
import { TargetSize } from './TargetSize'

export const CLIArguments = pipe(
  D.struct({
    size: TargetSize,
  }),
  D.intersect(
    D.partial({
      url: D.string,
      output: D.string,
      manifest: D.string,
      concurrency: Natural,
      timeout: Natural,
      skipExisting: D.boolean,
    }),
  ),
)
export type CLIArguments = D.TypeOf<typeof CLIArguments>
