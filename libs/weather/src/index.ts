export * from './providers/openweathermap.provider';
export * from './weather-provider.interface';
export * from './weather.config';
export * from './weather.module';
export * from './weather.types';
