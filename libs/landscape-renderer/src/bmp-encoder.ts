import { RenderError } from '@weatherscape/common'

const FILE_HEADER_SIZE = 14
const INFO_HEADER_SIZE = 40
const PIXEL_OFFSET = FILE_HEADER_SIZE + INFO_HEADER_SIZE
const BITS_PER_PIXEL = 24
// 72 DPI
const PIXELS_PER_METRE = 2835

export interface RawImageInfo {
  width: number
  height: number
  channels: number
}

/**
 * Encodes raw interleaved pixels (grey, RGB or RGBA) as an uncompressed
 * 24-bit bottom-up BMP. Alpha is dropped.
 */
export function encodeBmp(pixels: Buffer, info: RawImageInfo): Buffer {
  const { width, height, channels } = info

  if (channels !== 1 && channels !== 3 && channels !== 4) {
    throw new RenderError(`Cannot encode ${channels}-channel image as BMP`)
  }
  if (pixels.length < width * height * channels) {
    throw new RenderError(`Pixel buffer too short for ${width}x${height}x${channels}`)
  }

  const rowSize = Math.ceil((width * 3) / 4) * 4
  const imageSize = rowSize * height
  const fileSize = PIXEL_OFFSET + imageSize
  const out = Buffer.alloc(fileSize)

  out.write('BM', 0, 'ascii')
  out.writeUInt32LE(fileSize, 2)
  out.writeUInt32LE(PIXEL_OFFSET, 10)

  out.writeUInt32LE(INFO_HEADER_SIZE, 14)
  out.writeInt32LE(width, 18)
  out.writeInt32LE(height, 22)
  out.writeUInt16LE(1, 26)
  out.writeUInt16LE(BITS_PER_PIXEL, 28)
  out.writeUInt32LE(0, 30)
  out.writeUInt32LE(imageSize, 34)
  out.writeInt32LE(PIXELS_PER_METRE, 38)
  out.writeInt32LE(PIXELS_PER_METRE, 42)

  for (let row = 0; row < height; row++) {
    const sourceRow = height - 1 - row
    const rowStart = PIXEL_OFFSET + row * rowSize

    for (let x = 0; x < width; x++) {
      const src = (sourceRow * width + x) * channels
      const r = pixels[src]
      const g = channels === 1 ? r : pixels[src + 1]
      const b = channels === 1 ? r : pixels[src + 2]
      const dst = rowStart + x * 3
      out[dst] = b
      out[dst + 1] = g
      out[dst + 2] = r
    }
  }

  return out
}
