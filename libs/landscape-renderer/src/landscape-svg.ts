import { toCssColor, type LandscapePalette } from '@weatherscape/formats'
import type { LandscapeSize } from './landscape-renderer.types'
import { isDaylight, kelvinToFahrenheit, type TimelinePoint, type WeatherTimeline } from './weather-timeline'

const GROUND_TOP_RATIO = 0.45
const GROUND_BOTTOM_RATIO = 0.85
const CLOUD_ROW_RATIO = 0.22
const CLOUDY_THRESHOLD = 50
const CELESTIAL_RADIUS = 9
const TICK_HEIGHT = 5
const LABEL_SIZE = 14
const MAX_RAIN_STREAKS = 6
const MAX_SNOWFLAKES = 8

export interface LandscapeSvgInput {
  timeline: WeatherTimeline
  lat: number
  lon: number
  palette: LandscapePalette
  size: LandscapeSize
}

interface PlacedPoint {
  x: number
  y: number
  point: TimelinePoint
}

function round(value: number): number {
  return Math.round(value * 10) / 10
}

function placePoints(points: TimelinePoint[], { width, height }: LandscapeSize): PlacedPoint[] {
  const temperatures = points.map((p) => p.temperature)
  const min = Math.min(...temperatures)
  const max = Math.max(...temperatures)
  const top = height * GROUND_TOP_RATIO
  const bottom = height * GROUND_BOTTOM_RATIO
  const step = points.length > 1 ? width / (points.length - 1) : 0

  return points.map((point, i) => {
    const level = max > min ? (point.temperature - min) / (max - min) : 0.5
    return {
      x: round(points.length > 1 ? i * step : width / 2),
      y: round(bottom - level * (bottom - top)),
      point,
    }
  })
}

function groundElements(placed: PlacedPoint[], palette: LandscapePalette, { width, height }: LandscapeSize): string[] {
  // A single point is drawn as a flat horizon.
  const outline = placed.length > 1 ? placed : [{ ...placed[0], x: 0 }, { ...placed[0], x: width }]
  const line = outline.map(({ x, y }) => `${x},${y}`).join(' ')

  return [
    `<polygon points="0,${height} ${line} ${width},${height}" fill="${toCssColor(palette.soil)}"/>`,
    `<polyline points="${line}" fill="none" stroke="${toCssColor(palette.foreground)}" stroke-width="2"/>`,
  ]
}

function celestialElements(timeline: WeatherTimeline, palette: LandscapePalette, { width, height }: LandscapeSize): string[] {
  const cx = round(width * 0.1)
  const cy = round(height * 0.2)
  const fg = toCssColor(palette.foreground)
  const bg = toCssColor(palette.background)

  if (!isDaylight(timeline)) {
    return [
      `<circle cx="${cx}" cy="${cy}" r="${CELESTIAL_RADIUS}" fill="${fg}"/>`,
      `<circle cx="${round(cx + CELESTIAL_RADIUS / 2)}" cy="${round(cy - CELESTIAL_RADIUS / 3)}" r="${CELESTIAL_RADIUS}" fill="${bg}"/>`,
    ]
  }

  const rays = Array.from({ length: 8 }, (_, i) => {
    const angle = (i * Math.PI) / 4
    const inner = CELESTIAL_RADIUS + 2
    const outer = CELESTIAL_RADIUS + 6
    return `<line x1="${round(cx + inner * Math.cos(angle))}" y1="${round(cy + inner * Math.sin(angle))}" x2="${round(cx + outer * Math.cos(angle))}" y2="${round(cy + outer * Math.sin(angle))}" stroke="${fg}" stroke-width="1.5"/>`
  })

  return [`<circle cx="${cx}" cy="${cy}" r="${CELESTIAL_RADIUS}" fill="${bg}" stroke="${fg}" stroke-width="2"/>`, ...rays]
}

function weatherElements(placed: PlacedPoint[], palette: LandscapePalette, { height }: LandscapeSize): string[] {
  const cloudY = round(height * CLOUD_ROW_RATIO)
  const smoke = toCssColor(palette.smoke)
  const rain = toCssColor(palette.rain)
  const snow = toCssColor(palette.snow)
  const elements: string[] = []

  for (const { x, y, point } of placed) {
    if (point.cloudiness >= CLOUDY_THRESHOLD) {
      elements.push(
        `<ellipse cx="${x}" cy="${cloudY}" rx="14" ry="6" fill="${smoke}"/>`,
        `<ellipse cx="${round(x + 6)}" cy="${round(cloudY - 5)}" rx="8" ry="5" fill="${smoke}"/>`,
      )
    }

    const streaks = Math.min(MAX_RAIN_STREAKS, Math.ceil(point.rain * 2))
    for (let i = 0; i < streaks; i++) {
      const sx = round(x - 10 + i * 4)
      elements.push(`<line x1="${sx}" y1="${round(cloudY + 8)}" x2="${round(sx - 3)}" y2="${round(y - 4)}" stroke="${rain}" stroke-width="1"/>`)
    }

    const flakes = Math.min(MAX_SNOWFLAKES, Math.ceil(point.snow * 4))
    for (let i = 0; i < flakes; i++) {
      const fx = round(x - 12 + i * 3.5)
      const fy = round(cloudY + 10 + ((i * 7) % Math.max(1, y - cloudY - 14)))
      elements.push(`<circle cx="${fx}" cy="${fy}" r="1.5" fill="${snow}"/>`)
    }
  }

  return elements
}

function tickElements(placed: PlacedPoint[], palette: LandscapePalette, { height }: LandscapeSize): string[] {
  const fg = toCssColor(palette.foreground)
  return placed.map(({ x }) => `<line x1="${x}" y1="${height - TICK_HEIGHT}" x2="${x}" y2="${height}" stroke="${fg}" stroke-width="1"/>`)
}

/**
 * Draws a timeline as a landscape: the ground follows the temperature,
 * weather hangs above it, the sun or moon sits in the corner.
 */
export function buildLandscapeSvg(input: LandscapeSvgInput): string {
  const { timeline, lat, lon, palette, size } = input
  const placed = placePoints([timeline.current, ...timeline.forecast], size)
  const label = `${kelvinToFahrenheit(timeline.current.temperature)}°F`

  const body = [
    `<rect x="0" y="0" width="${size.width}" height="${size.height}" fill="${toCssColor(palette.background)}"/>`,
    ...celestialElements(timeline, palette, size),
    ...weatherElements(placed, palette, size),
    ...groundElements(placed, palette, size),
    ...tickElements(placed, palette, size),
    `<text x="${size.width - 6}" y="${LABEL_SIZE + 4}" text-anchor="end" font-family="Arial, sans-serif" font-size="${LABEL_SIZE}" font-weight="bold" fill="${toCssColor(palette.foreground)}">${label}</text>`,
  ]

  return `<svg width="${size.width}" height="${size.height}" xmlns="http://www.w3.org/2000/svg">
  <desc>${lat.toFixed(4)},${lon.toFixed(4)}</desc>
  ${body.join('\n  ')}
</svg>`
}
