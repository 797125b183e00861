import { Processor } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { QUEUE_LANDSCAPE_JOBS, type BatchSummary, type QueueMessage } from '@weatherscape/queue-jobs';
import { StageProcessor } from '../queues/stage.processor';
import { LandscapeGeneratorService } from './landscape-generator.service';

@Processor(QUEUE_LANDSCAPE_JOBS)
export class LandscapeGeneratorProcessor extends StageProcessor {
  protected readonly logger = new Logger(LandscapeGeneratorProcessor.name);

  constructor(private readonly generator: LandscapeGeneratorService) {
    super();
  }

  protected handleBatch(messages: QueueMessage[]): Promise<BatchSummary> {
    return this.generator.handleBatch(messages);
  }
}
