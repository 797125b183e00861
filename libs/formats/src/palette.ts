export type RgbColor = readonly [number, number, number]

export interface LandscapePalette {
  background: RgbColor
  foreground: RgbColor
  soil: RgbColor
  smoke: RgbColor
  rain: RgbColor
  snow: RgbColor
}

export const LIGHT_PALETTE: LandscapePalette = {
  background: [255, 255, 255],
  foreground: [0, 0, 0],
  soil: [148, 82, 1],
  smoke: [127, 127, 127],
  rain: [10, 100, 148],
  snow: [194, 194, 194],
}

export const DARK_PALETTE: LandscapePalette = {
  background: [0, 0, 0],
  foreground: [255, 255, 255],
  soil: [148, 82, 1],
  smoke: [127, 127, 127],
  rain: [122, 213, 255],
  snow: [255, 255, 255],
}

export const MONOCHROME_PALETTE: LandscapePalette = {
  background: [255, 255, 255],
  foreground: [0, 0, 0],
  soil: [0, 0, 0],
  smoke: [0, 0, 0],
  rain: [0, 0, 0],
  snow: [0, 0, 0],
}

export function toCssColor([r, g, b]: RgbColor): string {
  return `rgb(${r},${g},${b})`
}
