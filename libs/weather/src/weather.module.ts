import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WEATHER_PROVIDER } from './weather-provider.interface';
import { OpenWeatherMapProvider } from './providers/openweathermap.provider';

@Module({})
export class WeatherModule {
  static forRoot(): DynamicModule {
    return {
      module: WeatherModule,
      providers: [
        {
          provide: WEATHER_PROVIDER,
          useFactory: (configService: ConfigService) =>
            new OpenWeatherMapProvider({
              apiKey: configService.get<string>('weather.openWeatherMapApiKey'),
              apiUrl: configService.get<string>('weather.openWeatherMapApiUrl'),
              geoUrl: configService.get<string>('weather.openWeatherMapGeoUrl'),
            }),
          inject: [ConfigService],
        },
      ],
      exports: [WEATHER_PROVIDER],
    };
  }
}
