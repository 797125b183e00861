import { isRecord, RenderError } from '@weatherscape/common'
import type { WeatherPayload, WeatherSnapshot } from '@weatherscape/weather'

const MAX_FORECAST_POINTS = 8

export interface TimelinePoint {
  /** Unix seconds, UTC. */
  time: number
  /** Kelvin, the provider's default unit. */
  temperature: number
  conditionCode: number
  cloudiness: number
  rain: number
  snow: number
}

export interface WeatherTimeline {
  current: TimelinePoint
  forecast: TimelinePoint[]
  sunrise: number | null
  sunset: number | null
}

function readNumber(source: unknown, ...path: string[]): number | null {
  let value: unknown = source
  for (const key of path) {
    if (!isRecord(value)) return null
    value = value[key]
  }
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

function readConditionCode(entry: WeatherPayload): number {
  const conditions = entry.weather
  if (!Array.isArray(conditions) || conditions.length === 0) return 0
  return readNumber(conditions[0], 'id') ?? 0
}

function toPoint(entry: WeatherPayload, precipitationWindow: '1h' | '3h'): TimelinePoint | null {
  const time = readNumber(entry, 'dt')
  const temperature = readNumber(entry, 'main', 'temp')
  if (time === null || temperature === null) return null

  return {
    time,
    temperature,
    conditionCode: readConditionCode(entry),
    cloudiness: readNumber(entry, 'clouds', 'all') ?? 0,
    rain: readNumber(entry, 'rain', precipitationWindow) ?? 0,
    snow: readNumber(entry, 'snow', precipitationWindow) ?? 0,
  }
}

/**
 * Reduces the raw current/forecast payloads to the handful of values the
 * landscape draws. Forecast entries without a time or temperature are skipped.
 */
export function parseWeatherTimeline(snapshot: WeatherSnapshot): WeatherTimeline {
  const current = toPoint(snapshot.current, '1h')
  if (!current) {
    throw new RenderError('Current weather payload has no time or temperature')
  }

  const list = Array.isArray(snapshot.forecast.list) ? snapshot.forecast.list : []
  const forecast = list
    .filter(isRecord)
    .map((entry) => toPoint(entry, '3h'))
    .filter((point): point is TimelinePoint => point !== null && point.time > current.time)
    .slice(0, MAX_FORECAST_POINTS)

  return {
    current,
    forecast,
    sunrise: readNumber(snapshot.current, 'sys', 'sunrise'),
    sunset: readNumber(snapshot.current, 'sys', 'sunset'),
  }
}

export function kelvinToFahrenheit(kelvin: number): number {
  return Math.round(((kelvin - 273.15) * 9) / 5 + 32)
}

export function isDaylight(timeline: WeatherTimeline): boolean {
  const { sunrise, sunset, current } = timeline
  if (sunrise === null || sunset === null) return true
  return current.time >= sunrise && current.time < sunset
}
