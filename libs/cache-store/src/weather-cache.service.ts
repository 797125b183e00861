import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isRecord } from '@weatherscape/common';
import { DEFAULT_WEATHER_CACHE_TTL_SECONDS } from '@weatherscape/config';
import { isFormatId, type FormatId } from '@weatherscape/formats';
import { isWeatherPayload } from '@weatherscape/weather';
import { cacheKeys } from './cache-keys';
import type { ArtifactMetadata, GeocodeCacheEntry, WeatherCacheEntry } from './cache-store.types';
import { KEY_VALUE_STORE, type KeyValueStore } from './key-value-store.interface';

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isGeocodeEntry(value: unknown): value is GeocodeCacheEntry {
  return (
    isRecord(value) &&
    typeof value.lat === 'number' &&
    typeof value.lon === 'number' &&
    typeof value.zip === 'string'
  );
}

function isWeatherEntry(value: unknown): value is WeatherCacheEntry {
  return isRecord(value) && isWeatherPayload(value.current) && isWeatherPayload(value.forecast);
}

function isArtifactMetadata(value: unknown): value is ArtifactMetadata {
  return (
    isRecord(value) &&
    typeof value.generatedAt === 'string' &&
    typeof value.zip === 'string' &&
    typeof value.byteSize === 'number' &&
    isFormatId(value.formatVariant)
  );
}

/**
 * Geocode cache (permanent), weather cache (TTL-bounded) and the per-artifact
 * metadata records the generator keeps beside each upload.
 */
@Injectable()
export class WeatherCacheService {
  private readonly logger = new Logger(WeatherCacheService.name);
  private readonly weatherTtlSeconds: number;

  constructor(
    @Inject(KEY_VALUE_STORE)
    private readonly store: KeyValueStore,
    private readonly configService: ConfigService,
  ) {
    this.weatherTtlSeconds = this.configService.get<number>(
      'pipeline.weatherCacheTtlSeconds',
      DEFAULT_WEATHER_CACHE_TTL_SECONDS,
    );
  }

  get weatherTtl(): number {
    return this.weatherTtlSeconds;
  }

  async getGeocode(zip: string): Promise<GeocodeCacheEntry | null> {
    const raw = await this.store.get(cacheKeys.geocode(zip));
    if (raw === null) return null;

    const entry = parseJson(raw);
    if (!isGeocodeEntry(entry)) {
      this.logger.warn(`Discarding malformed geocode cache entry for ${zip}`);
      return null;
    }
    return entry;
  }

  /** Geocoding a ZIP never changes, so the entry has no expiry. */
  async putGeocode(entry: GeocodeCacheEntry): Promise<void> {
    await this.store.put(cacheKeys.geocode(entry.zip), JSON.stringify(entry));
  }

  async getWeather(zip: string): Promise<WeatherCacheEntry | null> {
    const raw = await this.store.get(cacheKeys.weather(zip));
    if (raw === null) return null;

    const entry = parseJson(raw);
    if (!isWeatherEntry(entry)) {
      this.logger.warn(`Discarding malformed weather cache entry for ${zip}`);
      return null;
    }
    return entry;
  }

  async putWeather(zip: string, entry: WeatherCacheEntry): Promise<void> {
    await this.store.put(
      cacheKeys.weather(zip),
      JSON.stringify({ current: entry.current, forecast: entry.forecast }),
      { ttlSeconds: this.weatherTtlSeconds },
    );
  }

  async putArtifactMetadata(metadata: ArtifactMetadata): Promise<void> {
    await this.store.put(
      cacheKeys.artifactMetadata(metadata.zip, metadata.formatVariant),
      JSON.stringify(metadata),
    );
  }

  async getArtifactMetadata(zip: string, format: FormatId): Promise<ArtifactMetadata | null> {
    const raw = await this.store.get(cacheKeys.artifactMetadata(zip, format));
    if (raw === null) return null;
    const value = parseJson(raw);
    return isArtifactMetadata(value) ? value : null;
  }
}
