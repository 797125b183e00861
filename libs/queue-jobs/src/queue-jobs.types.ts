import type { FormatId } from '@weatherscape/formats';
import type { TraceContext } from '@weatherscape/tracing';

export const QUEUE_ZIP_SCHEDULER = 'zip_scheduler';
export const QUEUE_FETCH_JOBS = 'fetch_jobs';
export const QUEUE_WEATHER_READY = 'weather_ready';
export const QUEUE_LANDSCAPE_JOBS = 'landscape_jobs';

export const JOB_SCHEDULER_TICK = 'tick';
export const JOB_FETCH = 'fetch';
export const JOB_WEATHER_READY = 'weather-ready';
export const JOB_GENERATE = 'generate';

export const ZIP_REFRESH_SCHEDULER_ID = 'zip-refresh';

/** Scheduler → Fetcher */
export interface FetchJobData {
  zip: string;
  scheduledAt: string;
  trace: TraceContext;
}

/** Fetcher → Dispatcher */
export interface WeatherReadyEventData {
  zip: string;
  lat: number;
  lon: number;
  fetchedAt: string;
  trace: TraceContext;
}

/** Dispatcher → Generator */
export interface GenerationJobData {
  zip: string;
  format: FormatId;
  lat: number;
  lon: number;
  enqueuedAt: string;
  trace: TraceContext;
}

/**
 * BullMQ rejects custom job ids containing ':'.
 */
export function generationJobId(data: Pick<GenerationJobData, 'zip' | 'format' | 'trace'>): string {
  return `${data.trace.traceId}_${data.zip}_${data.format}`;
}
