import type { WeatherPayload } from '@weatherscape/weather';
import current from './fixtures/owm-current.json';
import forecast from './fixtures/owm-forecast.json';

/** Current conditions as OpenWeatherMap returns them (Kelvin). */
export const owmCurrentFixture: WeatherPayload = current;

export const owmForecastFixture: WeatherPayload = forecast;
