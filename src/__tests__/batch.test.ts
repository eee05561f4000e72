import * as TE from 'fp-ts/lib/TaskEither'
import * as fs from 'fs'
import * as Path from 'path'

import { runBatch } from '../batch'
import { Fetcher } from '../http'
import { imageFetcher } from '../imageFetcher'
import { Natural } from '../models/Natural'
import { fileExists, makeImage, makeTempDir, removeDir } from './helpers'

const natural = (n: number): Natural => {
  const result = Natural.decode(n)
  if (result._tag === 'Left') {
    throw new Error(`${n} is not a natural number`)
  }
  return result.right
}

describe('runBatch', () => {
  let dir: string
  let image: Buffer

  beforeAll(async () => {
    image = await makeImage(40, 30)
  })

  beforeEach(async () => {
    dir = await makeTempDir()
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  const byUrl: Fetcher = (url) =>
    TE.right({
      statusCode: url.includes('missing') ? 404 : 200,
      finalUrl: url,
      body: image,
    })

  it('saves every entry and records failures without stopping', async () => {
    const tick = jest.fn()
    const entries = [
      { url: 'https://i.example.com/one.png', path: Path.join(dir, 'one.png') },
      {
        url: 'https://i.example.com/missing.png',
        path: Path.join(dir, 'missing.png'),
      },
      {
        url: 'https://i.example.com/three.png',
        path: Path.join(dir, 'three.png'),
      },
    ]

    const fetcher = imageFetcher({ targetSize: 16, fetcher: byUrl })

    const report = await runBatch(fetcher, entries, {
      concurrency: natural(2),
      skipExisting: false,
      tick,
    })()

    expect(report).toEqual({
      saved: 2,
      skipped: 0,
      failed: [
        {
          entry: entries[1],
          failure: { _tag: 'HttpStatusFailure', statusCode: 404 },
        },
      ],
    })
    expect(tick).toHaveBeenCalledTimes(3)
    expect(await fileExists(entries[0].path)).toBe(true)
    expect(await fileExists(entries[2].path)).toBe(true)
  })

  it('skips entries that already exist when asked to', async () => {
    const fetch = jest.fn(byUrl)
    const existing = Path.join(dir, 'existing.png')
    await fs.promises.writeFile(existing, 'previous run')
    const entries = [
      { url: 'https://i.example.com/existing.png', path: existing },
      {
        url: 'https://i.example.com/fresh.png',
        path: Path.join(dir, 'fresh.png'),
      },
    ]

    const fetcher = imageFetcher({ targetSize: 16, fetcher: fetch })

    const report = await runBatch(fetcher, entries, {
      concurrency: natural(1),
      skipExisting: true,
      tick: () => undefined,
    })()

    expect(report).toEqual({ saved: 1, skipped: 1, failed: [] })
    expect(fetch).toHaveBeenCalledTimes(1)
    expect(fetch).toHaveBeenCalledWith('https://i.example.com/fresh.png')
    expect(await fs.promises.readFile(existing, 'utf8')).toBe('previous run')
  })

  it('overwrites existing files by default', async () => {
    const existing = Path.join(dir, 'existing.png')
    await fs.promises.writeFile(existing, 'previous run')

    const report = await runBatch(
      imageFetcher({ targetSize: 16, fetcher: byUrl }),
      [{ url: 'https://i.example.com/existing.png', path: existing }],
      { concurrency: natural(4), skipExisting: false, tick: () => undefined },
    )()

    expect(report).toEqual({ saved: 1, skipped: 0, failed: [] })
    const contents = await fs.promises.readFile(existing, 'utf8')
    expect(contents).not.toBe('previous run')
  })

  it('reports an empty batch', async () => {
    const fetcher = imageFetcher({ targetSize: 16, fetcher: byUrl })

    const report = await runBatch(fetcher, [], {
      concurrency: natural(3),
      skipExisting: false,
      tick: () => undefined,
    })()

    expect(report).toEqual({ saved: 0, skipped: 0, failed: [] })
  })
})
