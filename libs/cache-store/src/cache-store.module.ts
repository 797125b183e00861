import { Module, Global } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { Clock } from '@weatherscape/common';
import { KEY_VALUE_STORE, REDIS_CLIENT } from './key-value-store.interface';
import { RedisKeyValueStore } from './redis-key-value.store';
import { StatusService } from './status.service';
import { WeatherCacheService } from './weather-cache.service';
import { ZipRegistryService } from './zip-registry.service';

@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: (configService: ConfigService) => {
        return new Redis({
          host: configService.get<string>('redis.host', 'localhost'),
          port: configService.get<number>('redis.port', 6379),
          lazyConnect: true,
        });
      },
      inject: [ConfigService],
    },
    {
      provide: KEY_VALUE_STORE,
      useClass: RedisKeyValueStore,
    },
    Clock,
    ZipRegistryService,
    WeatherCacheService,
    StatusService,
  ],
  exports: [KEY_VALUE_STORE, Clock, ZipRegistryService, WeatherCacheService, StatusService],
})
export class CacheStoreModule {}
