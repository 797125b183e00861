import { Coordinates, WeatherPayload } from './weather.types';

export interface WeatherProvider {
  /** False when credentials are missing; every call would fail. */
  isConfigured(): boolean;
  geocode(zip: string): Promise<Coordinates>;
  currentWeather(coords: Coordinates): Promise<WeatherPayload>;
  forecast(coords: Coordinates): Promise<WeatherPayload>;
}

export const WEATHER_PROVIDER = Symbol('WEATHER_PROVIDER');
