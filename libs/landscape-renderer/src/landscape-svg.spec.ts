import { DARK_PALETTE, LIGHT_PALETTE } from '@weatherscape/formats'
import { buildLandscapeSvg } from './landscape-svg'
import type { TimelinePoint, WeatherTimeline } from './weather-timeline'

const size = { width: 296, height: 128 }

function point(overrides: Partial<TimelinePoint>): TimelinePoint {
  return { time: 0, temperature: 290, conditionCode: 800, cloudiness: 0, rain: 0, snow: 0, ...overrides }
}

function timeline(overrides: Partial<WeatherTimeline> = {}): WeatherTimeline {
  return {
    current: point({ time: 100, temperature: 295.15 }),
    forecast: [point({ time: 200, temperature: 300 }), point({ time: 300, temperature: 290 })],
    sunrise: 50,
    sunset: 500,
    ...overrides,
  }
}

describe('buildLandscapeSvg', () => {
  it('sizes the canvas and labels the temperature in Fahrenheit', () => {
    const svg = buildLandscapeSvg({ timeline: timeline(), lat: 30.45, lon: -97.77, palette: LIGHT_PALETTE, size })

    expect(svg.startsWith('<svg width="296" height="128"')).toBe(true)
    expect(svg).toContain('>72°F</text>')
    expect(svg).toContain('<desc>30.4500,-97.7700</desc>')
  })

  it('raises the ground with the temperature', () => {
    const svg = buildLandscapeSvg({ timeline: timeline(), lat: 0, lon: 0, palette: LIGHT_PALETTE, size })

    // 290 K sits at the bottom (108.8), 300 K at the top (57.6).
    expect(svg).toContain('<polyline points="0,82.4 148,57.6 296,108.8"')
  })

  it('draws a flat horizon for a lone reading', () => {
    const svg = buildLandscapeSvg({ timeline: timeline({ forecast: [] }), lat: 0, lon: 0, palette: LIGHT_PALETTE, size })

    expect(svg).toContain('<polyline points="0,83.2 296,83.2"')
  })

  it('uses the palette colours', () => {
    const svg = buildLandscapeSvg({ timeline: timeline(), lat: 0, lon: 0, palette: DARK_PALETTE, size })

    expect(svg).toContain('<rect x="0" y="0" width="296" height="128" fill="rgb(0,0,0)"/>')
    expect(svg).toContain('fill="rgb(148,82,1)"')
  })

  it('draws the moon after sunset', () => {
    const day = buildLandscapeSvg({ timeline: timeline(), lat: 0, lon: 0, palette: LIGHT_PALETTE, size })
    const night = buildLandscapeSvg({ timeline: timeline({ sunset: 80 }), lat: 0, lon: 0, palette: LIGHT_PALETTE, size })

    expect(day).toContain('stroke-width="1.5"')
    expect(night).not.toContain('stroke-width="1.5"')
    expect(night).toContain('<circle cx="34.1" cy="22.6" r="9" fill="rgb(255,255,255)"/>')
  })

  it('adds clouds and rain for wet forecast points', () => {
    const wet = timeline({
      forecast: [point({ time: 200, temperature: 300, cloudiness: 90, rain: 1 })],
    })
    const svg = buildLandscapeSvg({ timeline: wet, lat: 0, lon: 0, palette: LIGHT_PALETTE, size })

    expect(svg.match(/<ellipse /g)).toHaveLength(2)
    expect(svg.match(/stroke="rgb\(10,100,148\)"/g)).toHaveLength(2)
  })

  it('is deterministic', () => {
    const input = { timeline: timeline(), lat: 1, lon: 2, palette: LIGHT_PALETTE, size }

    expect(buildLandscapeSvg(input)).toBe(buildLandscapeSvg(input))
  })
})
