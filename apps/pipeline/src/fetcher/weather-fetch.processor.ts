import { Processor } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { QUEUE_FETCH_JOBS, type BatchSummary, type QueueMessage } from '@weatherscape/queue-jobs';
import { StageProcessor } from '../queues/stage.processor';
import { WeatherFetcherService } from './weather-fetcher.service';

@Processor(QUEUE_FETCH_JOBS)
export class WeatherFetchProcessor extends StageProcessor {
  protected readonly logger = new Logger(WeatherFetchProcessor.name);

  constructor(private readonly fetcher: WeatherFetcherService) {
    super();
  }

  protected handleBatch(messages: QueueMessage[]): Promise<BatchSummary> {
    return this.fetcher.handleBatch(messages);
  }
}
