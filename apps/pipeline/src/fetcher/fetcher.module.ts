import { Module } from '@nestjs/common';
import { WeatherModule } from '@weatherscape/weather';
import { QueuesModule } from '../queues/queues.module';
import { WeatherFetchProcessor } from './weather-fetch.processor';
import { WeatherFetcherService } from './weather-fetcher.service';

@Module({
  imports: [QueuesModule, WeatherModule.forRoot()],
  providers: [WeatherFetcherService, WeatherFetchProcessor],
})
export class FetcherModule {}
