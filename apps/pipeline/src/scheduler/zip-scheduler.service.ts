import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { StatusService, ZipRegistryService } from '@weatherscape/cache-store';
import { assertValidZip, Clock, errorKind, errorMessage } from '@weatherscape/common';
import {
  JOB_FETCH,
  QUEUE_FETCH_JOBS,
  type BatchSummary,
  type FetchJobData,
  type MessageFailure,
} from '@weatherscape/queue-jobs';
import { createRootTrace, TraceLogger } from '@weatherscape/tracing';
import { logBatchSummary } from '../queues/batch-logging';

@Injectable()
export class ZipSchedulerService {
  private readonly logger = new Logger(ZipSchedulerService.name);
  private readonly traceLogger = new TraceLogger(this.logger);

  constructor(
    private readonly zipRegistry: ZipRegistryService,
    private readonly status: StatusService,
    private readonly clock: Clock,
    @InjectQueue(QUEUE_FETCH_JOBS)
    private readonly fetchQueue: Queue<FetchJobData>,
  ) {}

  /**
   * One cron tick: a fetch job with a fresh trace for every active ZIP.
   * A failed enqueue is counted and the remaining ZIPs still go out.
   */
  async tick(): Promise<BatchSummary> {
    let zips: string[];
    try {
      zips = await this.zipRegistry.getActiveZips();
    } catch (error) {
      this.logger.error(`Cannot read active ZIPs: ${errorMessage(error)}`);
      await this.status.recordSchedulerRun({
        total: 0,
        successCount: 0,
        errorCount: 1,
        errors: [{ messageId: 'active_zips', kind: errorKind(error), message: errorMessage(error) }],
      });
      throw error;
    }

    const errors: MessageFailure[] = [];
    for (const zip of zips) {
      const failure = await this.enqueue(zip);
      if (failure) errors.push(failure);
    }

    const summary: BatchSummary = {
      total: zips.length,
      successCount: zips.length - errors.length,
      errorCount: errors.length,
      errors,
    };
    logBatchSummary(this.logger, summary);
    await this.status.recordSchedulerRun(summary);
    return summary;
  }

  /** Refreshes one ZIP now, outside the cron cycle. */
  async scheduleZip(zip: string): Promise<FetchJobData> {
    const valid = assertValidZip(zip);
    const job = this.buildJob(valid);
    await this.fetchQueue.add(JOB_FETCH, job);
    this.traceLogger.log(`Manual refresh queued for ${valid}`, job.trace, { zip: valid });
    return job;
  }

  private async enqueue(zip: string): Promise<MessageFailure | null> {
    const job = this.buildJob(zip);
    try {
      await this.fetchQueue.add(JOB_FETCH, job);
      this.traceLogger.log(`Fetch job queued for ${zip}`, job.trace, { zip });
      return null;
    } catch (error) {
      this.traceLogger.error(`Failed to queue fetch job for ${zip}`, job.trace, error, { zip });
      return {
        messageId: zip,
        kind: errorKind(error),
        message: errorMessage(error),
        zip,
        traceId: job.trace.traceId,
      };
    }
  }

  private buildJob(zip: string): FetchJobData {
    return {
      zip,
      scheduledAt: this.clock.now().toISOString(),
      trace: createRootTrace(),
    };
  }
}
