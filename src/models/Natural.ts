import { pipe } from 'fp-ts/lib/function'
import * as D from 'io-ts/lib/Decoder'

interface NaturalBrand {
  readonly Natural: unique symbol
}

export type Natural = number & NaturalBrand

export const Natural: D.Decoder<unknown, Natural> = pipe(
  D.number,
  D.refine((n): n is Natural => n > 0 && Number.isInteger(n), 'Natural'),
)
