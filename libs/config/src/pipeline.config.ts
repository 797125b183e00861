import { registerAs } from '@nestjs/config';

export const DEFAULT_SCHEDULER_INTERVAL_MINUTES = 15;
/** Longer than one scheduler interval so a lagging generator still finds the cycle's data. */
export const DEFAULT_WEATHER_CACHE_TTL_SECONDS = 1200;
export const DEFAULT_ACTIVE_ZIPS = ['78729'];

export interface PipelineConfig {
  schedulerIntervalMinutes: number;
  weatherCacheTtlSeconds: number;
  defaultZips: string[];
  maxAttempts: number;
  backoffMs: number;
  statusErrorLimit: number;
}

export function parseZipList(value: string | undefined): string[] {
  if (!value) return [...DEFAULT_ACTIVE_ZIPS];
  return value
    .split(',')
    .map((zip) => zip.trim())
    .filter(Boolean);
}

export const pipelineConfig = registerAs('pipeline', (): PipelineConfig => ({
  schedulerIntervalMinutes: parseInt(
    process.env.SCHEDULER_INTERVAL_MINUTES || String(DEFAULT_SCHEDULER_INTERVAL_MINUTES),
    10,
  ),
  weatherCacheTtlSeconds: parseInt(
    process.env.WEATHER_CACHE_TTL_SECONDS || String(DEFAULT_WEATHER_CACHE_TTL_SECONDS),
    10,
  ),
  defaultZips: parseZipList(process.env.DEFAULT_ZIPS),
  maxAttempts: parseInt(process.env.STAGE_MAX_ATTEMPTS || '5', 10),
  backoffMs: parseInt(process.env.STAGE_BACKOFF_MS || '2000', 10),
  statusErrorLimit: 20,
}));
