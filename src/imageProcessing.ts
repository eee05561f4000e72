import * as E from 'fp-ts/lib/Either'
import { pipe } from 'fp-ts/lib/function'
import * as TE from 'fp-ts/lib/TaskEither'
import * as Path from 'path'
import sharp from 'sharp'

export interface Size {
  width: number
  height: number
}

/** Pixel box with exclusive `right` and `bottom` edges. */
export interface CropBox {
  left: number
  top: number
  right: number
  bottom: number
}

export interface CropGeometry {
  resized: Size
  box: CropBox
}

export interface ImageBuffer {
  data: Buffer
  info: Size & { channels: sharp.Raw['channels'] }
}

export type OutputFormat = 'jpeg' | 'png' | 'webp' | 'tiff' | 'avif' | 'gif'

const formatsByExtension: Readonly<Record<string, OutputFormat>> = {
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.png': 'png',
  '.webp': 'webp',
  '.tif': 'tiff',
  '.tiff': 'tiff',
  '.avif': 'avif',
  '.gif': 'gif',
}

export const roundHalfEven = (n: number): number => {
  const floor = Math.floor(n)
  const diff = n - floor
  if (diff < 0.5) {
    return floor
  }
  if (diff > 0.5) {
    return floor + 1
  }
  return floor % 2 === 0 ? floor : floor + 1
}

/**
 * Scales the shorter edge to `targetSize` and centers a `targetSize` square
 * on the longer one. Square results take the horizontal branch.
 */
export const computeCropGeometry = (
  { width, height }: Size,
  targetSize: number,
): CropGeometry => {
  const scale = targetSize / Math.min(width, height)
  const resized: Size = {
    width: roundHalfEven(width * scale),
    height: roundHalfEven(height * scale),
  }

  if (resized.width >= resized.height) {
    const left = Math.floor((resized.width - targetSize) / 2)
    return {
      resized,
      box: { left, top: 0, right: left + targetSize, bottom: targetSize },
    }
  }

  const top = Math.floor((resized.height - targetSize) / 2)
  return {
    resized,
    box: { left: 0, top, right: targetSize, bottom: top + targetSize },
  }
}

export const formatFromPath = (
  filePath: string,
): E.Either<Error, OutputFormat> => {
  const extension = Path.extname(filePath).toLowerCase()
  return pipe(
    formatsByExtension[extension],
    E.fromNullable(
      new Error(`Unsupported output format "${extension || filePath}"`),
    ),
  )
}

const toImageBuffer = (
  pipeline: sharp.Sharp,
): TE.TaskEither<Error, ImageBuffer> =>
  TE.tryCatch(
    () =>
      pipeline
        .raw()
        .toBuffer({ resolveWithObject: true })
        .then(({ data, info }) => ({
          data,
          info: {
            width: info.width,
            height: info.height,
            channels: info.channels,
          },
        })),
    E.toError,
  )

const fromImageBuffer = ({ data, info }: ImageBuffer): sharp.Sharp =>
  sharp(data, { raw: info })

// Alpha is dropped, not composited.
export const decodeRGB = (bytes: Buffer): TE.TaskEither<Error, ImageBuffer> =>
  pipe(
    E.tryCatch(
      () =>
        sharp(bytes, { failOn: 'error' })
          .removeAlpha()
          .toColourspace('srgb'),
      E.toError,
    ),
    TE.fromEither,
    TE.chain(toImageBuffer),
  )

export const resizeImage = (
  { width, height }: Size,
  image: ImageBuffer,
): TE.TaskEither<Error, ImageBuffer> =>
  toImageBuffer(
    fromImageBuffer(image).resize(width, height, {
      fit: 'fill',
      kernel: 'cubic',
    }),
  )

export const cropImage = (
  { left, top, right, bottom }: CropBox,
  image: ImageBuffer,
): TE.TaskEither<Error, ImageBuffer> =>
  toImageBuffer(
    fromImageBuffer(image).extract({
      left,
      top,
      width: right - left,
      height: bottom - top,
    }),
  )

export const cropResize = (targetSize: number) => (
  image: ImageBuffer,
): TE.TaskEither<Error, ImageBuffer> => {
  const { resized, box } = computeCropGeometry(image.info, targetSize)
  return pipe(
    resizeImage(resized, image),
    TE.chain((resizedImage) => cropImage(box, resizedImage)),
  )
}

export const encodeImage = (format: OutputFormat) => (
  image: ImageBuffer,
): TE.TaskEither<Error, Buffer> =>
  TE.tryCatch(
    () => fromImageBuffer(image).toFormat(format).toBuffer(),
    E.toError,
  )
