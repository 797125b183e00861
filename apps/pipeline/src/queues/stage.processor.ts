import { WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job, UnrecoverableError } from 'bullmq';
import { errorMessage, InvalidMessageError } from '@weatherscape/common';
import { QueueMessage, type BatchSummary } from '@weatherscape/queue-jobs';

export type StageJob = Pick<Job<unknown>, 'id' | 'name' | 'data' | 'attemptsMade'>;

/**
 * Feeds BullMQ jobs to a stage's batch handler one at a time. A message the
 * handler settles as retry-requested fails the job so BullMQ redelivers it
 * with backoff; an invalid body fails it for good.
 */
export abstract class StageProcessor extends WorkerHost {
  protected abstract readonly logger: Logger;

  protected abstract handleBatch(messages: QueueMessage[]): Promise<BatchSummary>;

  async process(job: StageJob): Promise<void> {
    const message = new QueueMessage(job.id ?? job.name, job.data, job.attemptsMade + 1);
    await this.handleBatch([message]);

    if (message.state !== 'retry-requested') {
      return;
    }

    const reason = message.retryReason;
    if (reason instanceof InvalidMessageError) {
      this.logger.warn(`Discarding job ${message.id}: ${reason.message}`);
      throw new UnrecoverableError(reason.message);
    }
    this.logger.warn(`Job ${message.id} failed on attempt ${message.attempts}: ${errorMessage(reason)}`);
    throw reason instanceof Error ? reason : new Error(errorMessage(reason));
  }
}
