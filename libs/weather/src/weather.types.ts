import { isRecord } from '@weatherscape/common';

export const WEATHER_COORD_PRECISION = 4;

export interface Coordinates {
  lat: number;
  lon: number;
}

/**
 * A provider response passed through untouched from fetcher to renderer.
 */
export type WeatherPayload = Record<string, unknown>;

export interface WeatherSnapshot {
  current: WeatherPayload;
  forecast: WeatherPayload;
}

export function formatCoordinate(value: number): string {
  return value.toFixed(WEATHER_COORD_PRECISION);
}

export function isWeatherPayload(value: unknown): value is WeatherPayload {
  return isRecord(value);
}
