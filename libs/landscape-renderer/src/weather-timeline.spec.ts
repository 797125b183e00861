import { RenderError } from '@weatherscape/common'
import { owmCurrentFixture as current, owmForecastFixture as forecast } from '@weatherscape/testing'
import { isDaylight, kelvinToFahrenheit, parseWeatherTimeline } from './weather-timeline'

describe('parseWeatherTimeline', () => {
  it('reads the current conditions', () => {
    const timeline = parseWeatherTimeline({ current, forecast })

    expect(timeline.current).toEqual({
      time: 1792411200,
      temperature: 295.15,
      conditionCode: 800,
      cloudiness: 0,
      rain: 0,
      snow: 0,
    })
    expect(timeline.sunrise).toBe(1792400400)
    expect(timeline.sunset).toBe(1792441800)
  })

  it('keeps only future forecast entries that have a temperature', () => {
    const timeline = parseWeatherTimeline({ current, forecast })

    expect(timeline.forecast.map((point) => point.time)).toEqual([
      1792422000, 1792432800, 1792443600, 1792465200,
    ])
  })

  it('reads three-hour precipitation from forecast entries', () => {
    const timeline = parseWeatherTimeline({ current, forecast })

    expect(timeline.forecast[2]).toMatchObject({ conditionCode: 500, cloudiness: 90, rain: 1.25, snow: 0 })
    expect(timeline.forecast[3]).toMatchObject({ conditionCode: 600, snow: 0.4 })
  })

  it('tolerates a forecast without a list', () => {
    expect(parseWeatherTimeline({ current, forecast: { cod: '200' } }).forecast).toEqual([])
  })

  it('fails when the current payload has no temperature', () => {
    expect(() => parseWeatherTimeline({ current: { dt: 1 }, forecast })).toThrow(RenderError)
  })
})

describe('kelvinToFahrenheit', () => {
  it('converts and rounds', () => {
    expect(kelvinToFahrenheit(273.15)).toBe(32)
    expect(kelvinToFahrenheit(295.15)).toBe(72)
  })
})

describe('isDaylight', () => {
  it('compares the current time with sunrise and sunset', () => {
    const timeline = parseWeatherTimeline({ current, forecast })

    expect(isDaylight(timeline)).toBe(true)
    expect(isDaylight({ ...timeline, current: { ...timeline.current, time: 1792441800 } })).toBe(false)
    expect(isDaylight({ ...timeline, sunrise: null })).toBe(true)
  })
})
