import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { StatusService, ZipRegistryService } from '@weatherscape/cache-store';
import { Clock, FanOutError } from '@weatherscape/common';
import {
  generationJobId,
  JOB_GENERATE,
  parseMessage,
  processBatch,
  QUEUE_LANDSCAPE_JOBS,
  QUEUE_WEATHER_READY,
  WeatherReadyEventMessage,
  type BatchSummary,
  type GenerationJobData,
  type MessageContext,
  type QueueMessage,
} from '@weatherscape/queue-jobs';
import { createChildTrace, TraceLogger } from '@weatherscape/tracing';
import { logBatchSummary } from '../queues/batch-logging';

@Injectable()
export class JobDispatcherService {
  private readonly logger = new Logger(JobDispatcherService.name);
  private readonly traceLogger = new TraceLogger(this.logger);

  constructor(
    private readonly zipRegistry: ZipRegistryService,
    private readonly status: StatusService,
    private readonly clock: Clock,
    @InjectQueue(QUEUE_LANDSCAPE_JOBS)
    private readonly landscapeQueue: Queue<GenerationJobData>,
  ) {}

  async handleBatch(messages: QueueMessage[]): Promise<BatchSummary> {
    const summary = await processBatch(messages, (message, context) => this.dispatch(message, context));
    logBatchSummary(this.logger, summary);
    await this.status.recordBatch('dispatcher', summary);
    return summary;
  }

  /**
   * One generation job per enabled format. The event is acknowledged only
   * when every job is queued; job ids make a redelivered event's jobs
   * collapse onto the ones already queued.
   */
  private async dispatch(message: QueueMessage, context: MessageContext): Promise<void> {
    const event = parseMessage(QUEUE_WEATHER_READY, WeatherReadyEventMessage, message.body);
    context.zip = event.zip;
    context.traceId = event.trace.traceId;

    const formats = await this.zipRegistry.getFormatsForZip(event.zip);
    const enqueuedAt = this.clock.now().toISOString();

    let enqueued = 0;
    for (const format of formats) {
      const job: GenerationJobData = {
        zip: event.zip,
        format,
        lat: event.lat,
        lon: event.lon,
        enqueuedAt,
        trace: createChildTrace(event.trace),
      };

      try {
        await this.landscapeQueue.add(JOB_GENERATE, job, { jobId: generationJobId(job) });
      } catch (error) {
        const fanOutError = new FanOutError(event.zip, enqueued, formats.length, { cause: error });
        this.traceLogger.error(fanOutError.message, event.trace, error, { zip: event.zip, format });
        throw fanOutError;
      }
      enqueued++;
    }

    this.traceLogger.log(`Dispatched ${enqueued} generation job(s) for ${event.zip}`, event.trace, {
      zip: event.zip,
      formats,
    });
  }
}
