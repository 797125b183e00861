import { plainToInstance, Type } from 'class-transformer';
import { IsString, IsNumber, IsOptional, IsIn, IsInt, Matches, validateSync, Min, Max } from 'class-validator';
import { DEFAULT_SCHEDULER_INTERVAL_MINUTES, DEFAULT_WEATHER_CACHE_TTL_SECONDS } from './pipeline.config';

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  DATABASE_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  @Max(65535)
  DATABASE_PORT?: number;

  @IsOptional()
  @IsString()
  DATABASE_USER?: string;

  @IsOptional()
  @IsString()
  DATABASE_PASSWORD?: string;

  @IsOptional()
  @IsString()
  DATABASE_NAME?: string;

  @IsOptional()
  @IsString()
  REDIS_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  @Max(65535)
  REDIS_PORT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  PORT?: number;

  @IsOptional()
  @IsString()
  NODE_ENV?: string;

  @IsOptional()
  @IsIn(['openweathermap'])
  WEATHER_PROVIDER?: string;

  @IsOptional()
  @IsString()
  OPENWEATHERMAP_API_KEY?: string;

  @IsOptional()
  @IsString()
  OPENWEATHERMAP_API_URL?: string;

  @IsOptional()
  @IsString()
  OPENWEATHERMAP_GEO_URL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SCHEDULER_INTERVAL_MINUTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(60)
  WEATHER_CACHE_TTL_SECONDS?: number;

  @IsOptional()
  @IsString()
  @Matches(/^\s*\d{5}(\s*,\s*\d{5})*\s*$/, { message: 'DEFAULT_ZIPS must be a comma separated list of 5-digit ZIP codes' })
  DEFAULT_ZIPS?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  STAGE_MAX_ATTEMPTS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  STAGE_BACKOFF_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(16)
  LANDSCAPE_WIDTH?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(16)
  LANDSCAPE_HEIGHT?: number;
}

/**
 * The weather cache must outlive one scheduler interval, otherwise the
 * generator of a cycle can miss the data its fetcher wrote.
 */
function checkCacheWindow(config: EnvironmentVariables): string | null {
  const interval = config.SCHEDULER_INTERVAL_MINUTES ?? DEFAULT_SCHEDULER_INTERVAL_MINUTES;
  const ttl = config.WEATHER_CACHE_TTL_SECONDS ?? DEFAULT_WEATHER_CACHE_TTL_SECONDS;

  if (ttl <= interval * 60) {
    return `WEATHER_CACHE_TTL_SECONDS (${ttl}) must be greater than SCHEDULER_INTERVAL_MINUTES * 60 (${interval * 60})`;
  }
  return null;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  const windowError = checkCacheWindow(validatedConfig);
  if (windowError) {
    throw new Error(windowError);
  }
  return validatedConfig;
}
