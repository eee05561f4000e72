import { pipe } from 'fp-ts/lib/function'
import * as D from 'io-ts/lib/Decoder'

interface TargetSizeBrand {
  readonly TargetSize: unique symbol
}

/**
 * Edge length of the square output. Zero or negative values disable
 * resizing and cropping altogether.
 */
export type TargetSize = number & TargetSizeBrand

export const TargetSize: D.Decoder<unknown, TargetSize> = pipe(
  D.number,
  D.refine((n): n is TargetSize => Number.isInteger(n), 'TargetSize'),
)

export const DEFAULT_TARGET_SIZE = 512
