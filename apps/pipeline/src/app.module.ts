import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import { CacheStoreModule } from '@weatherscape/cache-store';
import { databaseConfig, pipelineConfig, redisConfig, validate } from '@weatherscape/config';
import { ImageArtifact } from '@weatherscape/entities';
import { landscapeRendererConfig } from '@weatherscape/landscape-renderer';
import { weatherConfig } from '@weatherscape/weather';
import { AppController } from './app.controller';
import { DispatcherModule } from './dispatcher/dispatcher.module';
import { FetcherModule } from './fetcher/fetcher.module';
import { GeneratorModule } from './generator/generator.module';
import { SchedulerModule } from './scheduler/scheduler.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, redisConfig, weatherConfig, pipelineConfig, landscapeRendererConfig],
      validate,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get('database.host'),
        port: configService.get('database.port'),
        username: configService.get('database.username'),
        password: configService.get('database.password'),
        database: configService.get('database.database'),
        entities: [ImageArtifact],
        autoLoadEntities: true,
        synchronize: process.env.NODE_ENV !== 'production',
      }),
    }),
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get('redis.host'),
          port: configService.get('redis.port'),
        },
      }),
    }),
    CacheStoreModule,
    SchedulerModule,
    FetcherModule,
    DispatcherModule,
    GeneratorModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
