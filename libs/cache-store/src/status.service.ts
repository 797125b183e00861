import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock, errorMessage, isRecord } from '@weatherscape/common';
import type { BatchSummary, MessageFailure } from '@weatherscape/queue-jobs';
import { cacheKeys, type PipelineStage } from './cache-keys';
import type { SchedulerStatusRecord, StatusRecord } from './cache-store.types';
import { KEY_VALUE_STORE, type KeyValueStore } from './key-value-store.interface';

const DEFAULT_ERROR_LIMIT = 20;

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isMessageFailure(value: unknown): value is MessageFailure {
  return (
    isRecord(value) &&
    typeof value.messageId === 'string' &&
    typeof value.kind === 'string' &&
    typeof value.message === 'string'
  );
}

function isStatusRecord(value: unknown): value is StatusRecord {
  return (
    isRecord(value) &&
    typeof value.stage === 'string' &&
    typeof value.lastRunAt === 'string' &&
    typeof value.total === 'number' &&
    Array.isArray(value.errors) &&
    value.errors.every(isMessageFailure)
  );
}

/**
 * Run summaries read by the status surface. Counts describe the latest run;
 * `errors` is a rolling log across runs, capped to the most recent entries.
 * A failed status write is logged and swallowed: it must never turn a
 * processed batch into a failed one.
 */
@Injectable()
export class StatusService {
  private readonly logger = new Logger(StatusService.name);
  private readonly errorLimit: number;

  constructor(
    @Inject(KEY_VALUE_STORE)
    private readonly store: KeyValueStore,
    private readonly clock: Clock,
    private readonly configService: ConfigService,
  ) {
    this.errorLimit = this.configService.get<number>('pipeline.statusErrorLimit', DEFAULT_ERROR_LIMIT);
  }

  buildRecord(stage: PipelineStage, summary: BatchSummary, previousErrors: MessageFailure[] = []): StatusRecord {
    return {
      stage,
      lastRunAt: this.clock.now().toISOString(),
      total: summary.total,
      successCount: summary.successCount,
      errorCount: summary.errorCount,
      errors: [...previousErrors, ...summary.errors].slice(-this.errorLimit),
    };
  }

  async recordBatch(stage: Exclude<PipelineStage, 'scheduler'>, summary: BatchSummary): Promise<void> {
    try {
      const previous = await this.read(stage);
      await this.write(this.buildRecord(stage, summary, previous?.errors));
    } catch (error) {
      this.logger.warn(`Failed to update ${stage} status: ${errorMessage(error)}`);
    }
  }

  async recordSchedulerRun(summary: BatchSummary): Promise<void> {
    try {
      const previous = await this.read('scheduler');
      const record: SchedulerStatusRecord = {
        ...this.buildRecord('scheduler', summary, previous?.errors),
        stage: 'scheduler',
        totalZips: summary.total,
        enqueued: summary.successCount,
      };
      await this.write(record);
    } catch (error) {
      this.logger.warn(`Failed to update scheduler status: ${errorMessage(error)}`);
    }
  }

  /** A missing or unreadable record reads as `null`. */
  async read(stage: PipelineStage): Promise<StatusRecord | null> {
    const raw = await this.store.get(cacheKeys.status(stage));
    if (raw === null) return null;

    const record = parseJson(raw);
    if (!isStatusRecord(record)) {
      this.logger.warn(`Discarding malformed ${stage} status record`);
      return null;
    }
    return record;
  }

  private async write(record: StatusRecord): Promise<void> {
    await this.store.put(cacheKeys.status(record.stage), JSON.stringify(record));
  }
}
