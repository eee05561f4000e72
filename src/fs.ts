import * as E from 'fp-ts/lib/Either'
import * as T from 'fp-ts/lib/Task'
import * as TE from 'fp-ts/lib/TaskEither'
import * as fs from 'fs'

export const ensureDir = (dir: string): TE.TaskEither<Error, void> =>
  TE.tryCatch(
    () => fs.promises.mkdir(dir, { recursive: true }).then(() => undefined),
    E.toError,
  )

export const writeFile = (
  p: string,
  data: Buffer,
): TE.TaskEither<Error, void> =>
  TE.tryCatch(() => fs.promises.writeFile(p, data), E.toError)

export const readTextFile = (p: string): TE.TaskEither<Error, string> =>
  TE.tryCatch(() => fs.promises.readFile(p, 'utf8'), E.toError)

export const exists = (p: string): T.Task<boolean> => () =>
  fs.promises.access(p).then(
    () => true,
    () => false,
  )
