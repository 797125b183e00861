import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { StatusService, WeatherCacheService } from '@weatherscape/cache-store';
import { Clock, ConfigurationError, errorMessage } from '@weatherscape/common';
import {
  FetchJobMessage,
  JOB_WEATHER_READY,
  parseMessage,
  processBatch,
  QUEUE_FETCH_JOBS,
  QUEUE_WEATHER_READY,
  retryBatch,
  type BatchSummary,
  type MessageContext,
  type QueueMessage,
  type WeatherReadyEventData,
} from '@weatherscape/queue-jobs';
import { createChildTrace, TraceLogger, type TraceContext } from '@weatherscape/tracing';
import { WEATHER_PROVIDER, type Coordinates, type WeatherProvider } from '@weatherscape/weather';
import { logBatchSummary } from '../queues/batch-logging';

@Injectable()
export class WeatherFetcherService {
  private readonly logger = new Logger(WeatherFetcherService.name);
  private readonly traceLogger = new TraceLogger(this.logger);

  constructor(
    @Inject(WEATHER_PROVIDER)
    private readonly weatherProvider: WeatherProvider,
    private readonly weatherCache: WeatherCacheService,
    private readonly status: StatusService,
    private readonly clock: Clock,
    @InjectQueue(QUEUE_WEATHER_READY)
    private readonly weatherReadyQueue: Queue<WeatherReadyEventData>,
  ) {}

  async handleBatch(messages: QueueMessage[]): Promise<BatchSummary> {
    let summary: BatchSummary;

    if (!this.weatherProvider.isConfigured()) {
      const error = new ConfigurationError('Weather provider credentials are not configured');
      this.logger.error(`${error.message}; returning ${messages.length} message(s) for redelivery`);
      summary = retryBatch(messages, error);
    } else {
      summary = await processBatch(messages, (message, context) => this.fetch(message, context));
    }

    logBatchSummary(this.logger, summary);
    await this.status.recordBatch('fetcher', summary);
    return summary;
  }

  private async fetch(message: QueueMessage, context: MessageContext): Promise<void> {
    const job = parseMessage(QUEUE_FETCH_JOBS, FetchJobMessage, message.body);
    context.zip = job.zip;
    context.traceId = job.trace.traceId;

    try {
      const coords = await this.resolveCoordinates(job.zip, job.trace);
      const [current, forecast] = await Promise.all([
        this.weatherProvider.currentWeather(coords),
        this.weatherProvider.forecast(coords),
      ]);

      // The event is only sent once the data it announces is readable.
      await this.weatherCache.putWeather(job.zip, { current, forecast });

      const event: WeatherReadyEventData = {
        zip: job.zip,
        lat: coords.lat,
        lon: coords.lon,
        fetchedAt: this.clock.now().toISOString(),
        trace: createChildTrace(job.trace),
      };
      await this.weatherReadyQueue.add(JOB_WEATHER_READY, event);

      this.traceLogger.log(`Weather cached for ${job.zip}`, event.trace, {
        zip: job.zip,
        ttlSeconds: this.weatherCache.weatherTtl,
      });
    } catch (error) {
      this.traceLogger.error(`Weather fetch failed for ${job.zip}`, job.trace, error, { zip: job.zip });
      throw error;
    }
  }

  private async resolveCoordinates(zip: string, trace: TraceContext): Promise<Coordinates> {
    const cached = await this.weatherCache.getGeocode(zip);
    if (cached) {
      return { lat: cached.lat, lon: cached.lon };
    }

    const coords = await this.weatherProvider.geocode(zip);
    // A failed geocode write does not fail the fetch.
    try {
      await this.weatherCache.putGeocode({
        lat: coords.lat,
        lon: coords.lon,
        zip,
        cachedAt: this.clock.now().toISOString(),
      });
    } catch (error) {
      this.traceLogger.warn(`Failed to cache coordinates for ${zip}: ${errorMessage(error)}`, trace, { zip });
    }
    this.logger.log(`Geocoded ${zip} to ${coords.lat},${coords.lon}`);
    return coords;
  }
}
