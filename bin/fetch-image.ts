#!/usr/bin/env node

'use strict'

import * as E from 'fp-ts/lib/Either'
import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'

import { main } from '../src'
import { reportError } from '../src/reporting'
import { DEFAULT_TARGET_SIZE } from '../src/models/TargetSize'

const argv = yargs(hideBin(process.argv))
  .option('url', {
    alias: 'u',
    type: 'string',
    describe: 'image URL to fetch',
  })
  .option('output', {
    alias: 'o',
    type: 'string',
    describe: 'file to save the image to, its extension picks the format',
  })
  .option('manifest', {
    alias: 'm',
    type: 'string',
    describe: 'JSON file listing { url, path } entries to fetch',
  })
  .option('size', {
    alias: 's',
    type: 'number',
    default: DEFAULT_TARGET_SIZE,
    describe: 'edge of the square crop, --size=-1 keeps the original size',
  })
  .option('concurrency', {
    alias: 'c',
    type: 'number',
    describe: 'parallel downloads for a manifest, defaults to the CPU count',
  })
  .option('timeout', {
    alias: 't',
    type: 'number',
    describe: 'request timeout in milliseconds',
  })
  .option('skip-existing', {
    type: 'boolean',
    default: false,
    describe: 'skip manifest entries whose file already exists',
  })
  .conflicts('manifest', 'url')
  .strict()
  .parseSync()

main(argv)().then(
  E.fold(
    (err) => {
      reportError(err)()
      process.exitCode = 1
    },
    () => undefined,
  ),
)
