import type { FormatConfig, FormatId } from '@weatherscape/formats'
import type { WeatherSnapshot } from '@weatherscape/weather'

export interface RenderRequest {
  weather: WeatherSnapshot
  lat: number
  lon: number
  format: FormatId
}

export interface RenderResult {
  buffer: Buffer
  mimeType: FormatConfig['mimeType']
  extension: FormatConfig['extension']
}

/**
 * Same request, same bytes.
 */
export interface LandscapeRenderer {
  render(request: RenderRequest): Promise<RenderResult>
}

export interface LandscapeSize {
  width: number
  height: number
}

export const LANDSCAPE_RENDERER = Symbol('LANDSCAPE_RENDERER')
