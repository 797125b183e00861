import { UnknownFormatError } from '@weatherscape/common'
import { DARK_PALETTE, LIGHT_PALETTE, MONOCHROME_PALETTE, type LandscapePalette } from './palette'

export const FORMAT_IDS = ['rgb_light', 'rgb_dark', 'bw', 'eink', 'bwi'] as const

export type FormatId = (typeof FORMAT_IDS)[number]

export const DEFAULT_FORMAT: FormatId = 'rgb_light'

export type ImageEncoding = 'png' | 'bmp'

export interface FormatConfig {
  readonly id: FormatId
  readonly title: string
  readonly extension: '.png' | '.bmp'
  readonly mimeType: 'image/png' | 'image/bmp'
  readonly encoding: ImageEncoding
  readonly palette: LandscapePalette
  readonly monochrome: boolean
  /** Swap black and white after rasterising. */
  readonly invert: boolean
  /** Rotate 180° for panels mounted upside down. */
  readonly einkFlip: boolean
}

export const FORMAT_CONFIGS: Readonly<Record<FormatId, FormatConfig>> = {
  rgb_light: {
    id: 'rgb_light',
    title: 'RGB Light Theme',
    extension: '.png',
    mimeType: 'image/png',
    encoding: 'png',
    palette: LIGHT_PALETTE,
    monochrome: false,
    invert: false,
    einkFlip: false,
  },
  rgb_dark: {
    id: 'rgb_dark',
    title: 'RGB Dark Theme',
    extension: '.png',
    mimeType: 'image/png',
    encoding: 'png',
    palette: DARK_PALETTE,
    monochrome: false,
    invert: false,
    einkFlip: false,
  },
  bw: {
    id: 'bw',
    title: 'Black & White',
    extension: '.bmp',
    mimeType: 'image/bmp',
    encoding: 'bmp',
    palette: MONOCHROME_PALETTE,
    monochrome: true,
    invert: false,
    einkFlip: false,
  },
  eink: {
    id: 'eink',
    title: 'E-Ink (Flipped)',
    extension: '.bmp',
    mimeType: 'image/bmp',
    encoding: 'bmp',
    palette: MONOCHROME_PALETTE,
    monochrome: true,
    invert: false,
    einkFlip: true,
  },
  bwi: {
    id: 'bwi',
    title: 'Black & White Inverted',
    extension: '.bmp',
    mimeType: 'image/bmp',
    encoding: 'bmp',
    palette: MONOCHROME_PALETTE,
    monochrome: true,
    invert: true,
    einkFlip: false,
  },
}

export function isFormatId(value: unknown): value is FormatId {
  return typeof value === 'string' && FORMAT_IDS.some((id) => id === value)
}

/**
 * Lower-cases and maps kebab-case aliases (`rgb-dark`) onto identifiers.
 * Does not check that the result is a known format.
 */
export function normalizeFormatName(value: string): string {
  return value.trim().toLowerCase().replace(/-/g, '_')
}

export function getFormatConfig(format: string): FormatConfig {
  const normalized = normalizeFormatName(format)
  if (!isFormatId(normalized)) {
    throw new UnknownFormatError(format)
  }
  return FORMAT_CONFIGS[normalized]
}

export function artifactKey(zip: string, format: FormatId): string {
  return `${zip}/${format}${FORMAT_CONFIGS[format].extension}`
}
