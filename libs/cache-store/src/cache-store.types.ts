import type { FormatId } from '@weatherscape/formats';
import type { WeatherSnapshot } from '@weatherscape/weather';
import type { MessageFailure } from '@weatherscape/queue-jobs';
import type { PipelineStage } from './cache-keys';

export interface GeocodeCacheEntry {
  lat: number;
  lon: number;
  zip: string;
  cachedAt: string;
}

/** Written once per cycle by the fetcher; never patched. */
export type WeatherCacheEntry = WeatherSnapshot;

export interface ArtifactMetadata {
  generatedAt: string;
  lat: number;
  lon: number;
  zip: string;
  byteSize: number;
  formatVariant: FormatId;
}

export interface StatusRecord {
  stage: PipelineStage;
  lastRunAt: string;
  total: number;
  successCount: number;
  errorCount: number;
  errors: MessageFailure[];
}

export interface SchedulerStatusRecord extends StatusRecord {
  stage: 'scheduler';
  totalZips: number;
  enqueued: number;
}
