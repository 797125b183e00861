import { Type } from 'class-transformer';
import {
  IsIn,
  IsISO8601,
  IsLatitude,
  IsLongitude,
  IsObject,
  IsString,
  Matches,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { FORMAT_IDS, type FormatId } from '@weatherscape/formats';
import type { TraceContext } from '@weatherscape/tracing';
import type { FetchJobData, GenerationJobData, WeatherReadyEventData } from './queue-jobs.types';

const ZIP_PATTERN = /^\d{5}$/;

export class TraceContextDto implements TraceContext {
  @Matches(/^[0-9a-f]{32}$/)
  traceId!: string;

  @Matches(/^[0-9a-f]{16}$/)
  spanId!: string;

  @ValidateIf((_, value) => value !== null)
  @Matches(/^[0-9a-f]{16}$/)
  parentSpanId!: string | null;
}

export class FetchJobMessage implements FetchJobData {
  @IsString()
  @Matches(ZIP_PATTERN, { message: 'zip must be a 5-digit ZIP code' })
  zip!: string;

  @IsISO8601()
  scheduledAt!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => TraceContextDto)
  trace!: TraceContextDto;
}

export class WeatherReadyEventMessage implements WeatherReadyEventData {
  @IsString()
  @Matches(ZIP_PATTERN, { message: 'zip must be a 5-digit ZIP code' })
  zip!: string;

  @IsLatitude()
  lat!: number;

  @IsLongitude()
  lon!: number;

  @IsISO8601()
  fetchedAt!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => TraceContextDto)
  trace!: TraceContextDto;
}

export class GenerationJobMessage implements GenerationJobData {
  @IsString()
  @Matches(ZIP_PATTERN, { message: 'zip must be a 5-digit ZIP code' })
  zip!: string;

  @IsIn(FORMAT_IDS)
  format!: FormatId;

  @IsLatitude()
  lat!: number;

  @IsLongitude()
  lon!: number;

  @IsISO8601()
  enqueuedAt!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => TraceContextDto)
  trace!: TraceContextDto;
}
