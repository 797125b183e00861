import { Inject, Injectable, Logger } from '@nestjs/common';
import { ARTIFACT_STORE, type ArtifactStore } from '@weatherscape/artifact-store';
import { StatusService, WeatherCacheService, type ArtifactMetadata } from '@weatherscape/cache-store';
import { Clock, StalePipelineError } from '@weatherscape/common';
import { artifactKey } from '@weatherscape/formats';
import { LANDSCAPE_RENDERER, type LandscapeRenderer } from '@weatherscape/landscape-renderer';
import {
  GenerationJobMessage,
  parseMessage,
  processBatch,
  QUEUE_LANDSCAPE_JOBS,
  type BatchSummary,
  type MessageContext,
  type QueueMessage,
} from '@weatherscape/queue-jobs';
import { TraceLogger } from '@weatherscape/tracing';
import { logBatchSummary } from '../queues/batch-logging';

@Injectable()
export class LandscapeGeneratorService {
  private readonly logger = new Logger(LandscapeGeneratorService.name);
  private readonly traceLogger = new TraceLogger(this.logger);

  constructor(
    @Inject(LANDSCAPE_RENDERER)
    private readonly renderer: LandscapeRenderer,
    @Inject(ARTIFACT_STORE)
    private readonly artifactStore: ArtifactStore,
    private readonly weatherCache: WeatherCacheService,
    private readonly status: StatusService,
    private readonly clock: Clock,
  ) {}

  async handleBatch(messages: QueueMessage[]): Promise<BatchSummary> {
    const summary = await processBatch(messages, (message, context) => this.generate(message, context));
    logBatchSummary(this.logger, summary);
    await this.status.recordBatch('generator', summary);
    return summary;
  }

  private async generate(message: QueueMessage, context: MessageContext): Promise<void> {
    const job = parseMessage(QUEUE_LANDSCAPE_JOBS, GenerationJobMessage, message.body);
    context.zip = job.zip;
    context.traceId = job.trace.traceId;
    const key = artifactKey(job.zip, job.format);

    try {
      const weather = await this.weatherCache.getWeather(job.zip);
      if (!weather) {
        throw new StalePipelineError(job.zip);
      }

      const image = await this.renderer.render({
        weather,
        lat: job.lat,
        lon: job.lon,
        format: job.format,
      });

      const metadata: ArtifactMetadata = {
        generatedAt: this.clock.now().toISOString(),
        lat: job.lat,
        lon: job.lon,
        zip: job.zip,
        byteSize: image.buffer.length,
        formatVariant: job.format,
      };
      await this.artifactStore.put(key, image.buffer, { contentType: image.mimeType, metadata });
      await this.weatherCache.putArtifactMetadata(metadata);

      this.traceLogger.log(`Uploaded ${key}`, job.trace, { zip: job.zip, format: job.format, bytes: metadata.byteSize });
    } catch (error) {
      this.traceLogger.error(`Generation failed for ${key}`, job.trace, error, { zip: job.zip, format: job.format });
      throw error;
    }
  }
}
