import { registerAs } from '@nestjs/config';

export const weatherConfig = registerAs('weather', () => ({
  openWeatherMapApiKey: process.env.OPENWEATHERMAP_API_KEY,
  openWeatherMapApiUrl: process.env.OPENWEATHERMAP_API_URL || 'https://api.openweathermap.org/data/2.5',
  openWeatherMapGeoUrl: process.env.OPENWEATHERMAP_GEO_URL || 'https://api.openweathermap.org/geo/1.0',
}));
