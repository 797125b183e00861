import { Processor } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { QUEUE_WEATHER_READY, type BatchSummary, type QueueMessage } from '@weatherscape/queue-jobs';
import { StageProcessor } from '../queues/stage.processor';
import { JobDispatcherService } from './job-dispatcher.service';

@Processor(QUEUE_WEATHER_READY)
export class JobDispatcherProcessor extends StageProcessor {
  protected readonly logger = new Logger(JobDispatcherProcessor.name);

  constructor(private readonly dispatcher: JobDispatcherService) {
    super();
  }

  protected handleBatch(messages: QueueMessage[]): Promise<BatchSummary> {
    return this.dispatcher.handleBatch(messages);
  }
}
