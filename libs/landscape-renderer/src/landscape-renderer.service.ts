import { Injectable } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import sharp from 'sharp'

import { errorMessage, RenderError } from '@weatherscape/common'
import { FORMAT_CONFIGS, type FormatConfig } from '@weatherscape/formats'
import { encodeBmp } from './bmp-encoder'
import { buildLandscapeSvg } from './landscape-svg'
import type { LandscapeRenderer, LandscapeSize, RenderRequest, RenderResult } from './landscape-renderer.types'
import { parseWeatherTimeline } from './weather-timeline'

const DEFAULT_WIDTH = 296
const DEFAULT_HEIGHT = 128
const MONOCHROME_THRESHOLD = 128

@Injectable()
export class LandscapeRendererService implements LandscapeRenderer {
  private readonly size: LandscapeSize

  constructor(private readonly configService: ConfigService) {
    this.size = {
      width: this.configService.get<number>('landscapeRenderer.width', DEFAULT_WIDTH),
      height: this.configService.get<number>('landscapeRenderer.height', DEFAULT_HEIGHT),
    }
  }

  async render(request: RenderRequest): Promise<RenderResult> {
    const format = FORMAT_CONFIGS[request.format]
    const svg = buildLandscapeSvg({
      timeline: parseWeatherTimeline(request.weather),
      lat: request.lat,
      lon: request.lon,
      palette: format.palette,
      size: this.size,
    })

    try {
      const buffer = await this.rasterise(Buffer.from(svg), format)
      return { buffer, mimeType: format.mimeType, extension: format.extension }
    } catch (error) {
      if (error instanceof RenderError) throw error
      throw new RenderError(`Failed to render ${format.id}: ${errorMessage(error)}`, { cause: error })
    }
  }

  private async rasterise(svg: Buffer, format: FormatConfig): Promise<Buffer> {
    const [r, g, b] = format.palette.background
    let image = sharp(svg).flatten({ background: { r, g, b } })

    if (format.monochrome) {
      image = image.threshold(MONOCHROME_THRESHOLD)
    }
    if (format.invert) {
      image = image.negate({ alpha: false })
    }
    if (format.einkFlip) {
      image = image.rotate(180)
    }

    if (format.encoding === 'png') {
      return image.png().toBuffer()
    }

    const { data, info } = await image.raw().toBuffer({ resolveWithObject: true })
    return encodeBmp(data, { width: info.width, height: info.height, channels: info.channels })
  }
}
