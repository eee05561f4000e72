import * as TE from 'fp-ts/lib/TaskEither'
import * as fs from 'fs'
import * as os from 'os'
import * as Path from 'path'
import sharp from 'sharp'

import { Fetcher, FetchResult } from '../http'

export const makeImage = (
  width: number,
  height: number,
  format: 'png' | 'jpeg' = 'png',
  channels: 3 | 4 = 3,
): Promise<Buffer> =>
  sharp({
    create: {
      width,
      height,
      channels,
      background: { r: 200, g: 40, b: 40, alpha: 0.5 },
    },
  })
    .toFormat(format)
    .toBuffer()

export const makeGreyImage = (
  width: number,
  height: number,
  withAlpha = false,
): Promise<Buffer> => {
  const grey = sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 90, g: 90, b: 90 },
    },
  }).toColourspace('b-w')
  return (withAlpha ? grey.ensureAlpha(0.5) : grey).png().toBuffer()
}

export const respondWith = (response: Partial<FetchResult>): Fetcher => (
  url,
) =>
  TE.right({
    statusCode: 200,
    finalUrl: url,
    body: Buffer.alloc(0),
    ...response,
  })

export const failWith = (message: string): Fetcher => () =>
  TE.left(new Error(message))

export const makeTempDir = (): Promise<string> =>
  fs.promises.mkdtemp(Path.join(os.tmpdir(), 'image-fetch-'))

export const removeDir = (dir: string): Promise<void> =>
  fs.promises.rm(dir, { recursive: true, force: true })

export const fileExists = (p: string): Promise<boolean> =>
  fs.promises.access(p).then(
    () => true,
    () => false,
  )
