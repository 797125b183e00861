import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { assertValidZip, ConfigurationError, isValidZip } from '@weatherscape/common';
import { DEFAULT_ACTIVE_ZIPS } from '@weatherscape/config';
import { DEFAULT_FORMAT, getFormatConfig, isFormatId, type FormatId } from '@weatherscape/formats';
import { cacheKeys } from './cache-keys';
import { KEY_VALUE_STORE, type KeyValueStore } from './key-value-store.interface';

function parseStringList(raw: string): string[] | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    return null;
  }
  return value;
}

function unique<T>(items: T[]): T[] {
  return Array.from(new Set(items));
}

/**
 * Active ZIP set and per-ZIP format lists. Every write replaces the whole
 * list, so concurrent admin actions are last-writer-wins.
 */
@Injectable()
export class ZipRegistryService {
  private readonly logger = new Logger(ZipRegistryService.name);
  private readonly defaultZips: string[];

  constructor(
    @Inject(KEY_VALUE_STORE)
    private readonly store: KeyValueStore,
    private readonly configService: ConfigService,
  ) {
    this.defaultZips = this.configService.get<string[]>('pipeline.defaultZips', DEFAULT_ACTIVE_ZIPS);
  }

  async getActiveZips(): Promise<string[]> {
    const raw = await this.store.get(cacheKeys.activeZips());

    if (raw === null) {
      const zips = unique(this.defaultZips.filter(isValidZip));
      await this.store.put(cacheKeys.activeZips(), JSON.stringify(zips));
      this.logger.log(`Initialized active ZIPs with defaults: ${zips.join(', ')}`);
      return zips;
    }

    const stored = parseStringList(raw);
    if (!stored) {
      throw new ConfigurationError(`Stored ${cacheKeys.activeZips()} is not a JSON array of strings`);
    }

    const invalid = stored.filter((zip) => !isValidZip(zip));
    if (invalid.length > 0) {
      this.logger.warn(`Ignoring invalid active ZIPs: ${invalid.join(', ')}`);
    }
    return unique(stored.filter(isValidZip));
  }

  async addActiveZip(zip: string): Promise<string[]> {
    const valid = assertValidZip(zip);
    const zips = await this.getActiveZips();

    if (!zips.includes(valid)) {
      zips.push(valid);
      await this.store.put(cacheKeys.activeZips(), JSON.stringify(zips));
      this.logger.log(`Added ${valid} to active ZIPs`);
    }
    return zips;
  }

  async removeActiveZip(zip: string): Promise<string[]> {
    const zips = await this.getActiveZips();
    const remaining = zips.filter((active) => active !== zip);

    if (remaining.length !== zips.length) {
      await this.store.put(cacheKeys.activeZips(), JSON.stringify(remaining));
      this.logger.log(`Removed ${zip} from active ZIPs`);
    }
    return remaining;
  }

  /**
   * Formats to generate for a ZIP. The default format is always first when
   * it was missing; unknown identifiers are dropped.
   */
  async getFormatsForZip(zip: string): Promise<FormatId[]> {
    const raw = await this.store.get(cacheKeys.formats(zip));
    if (raw === null) {
      return [DEFAULT_FORMAT];
    }

    const stored = parseStringList(raw);
    if (!stored) {
      this.logger.warn(`Stored formats for ${zip} are malformed, using ${DEFAULT_FORMAT}`);
      return [DEFAULT_FORMAT];
    }

    const unknown = stored.filter((format) => !isFormatId(format));
    if (unknown.length > 0) {
      this.logger.warn(`Ignoring unknown formats for ${zip}: ${unknown.join(', ')}`);
    }

    const formats = unique(stored.filter(isFormatId));
    if (!formats.includes(DEFAULT_FORMAT)) {
      formats.unshift(DEFAULT_FORMAT);
    }
    return formats;
  }

  async setFormatsForZip(zip: string, formats: string[]): Promise<FormatId[]> {
    const valid = assertValidZip(zip);
    const resolved = unique(formats.map((format) => getFormatConfig(format).id));
    if (!resolved.includes(DEFAULT_FORMAT)) {
      resolved.unshift(DEFAULT_FORMAT);
    }

    await this.store.put(cacheKeys.formats(valid), JSON.stringify(resolved));
    return resolved;
  }

  async addFormatToZip(zip: string, format: string): Promise<FormatId[]> {
    const valid = assertValidZip(zip);
    const { id } = getFormatConfig(format);
    const formats = await this.getFormatsForZip(valid);

    if (!formats.includes(id)) {
      formats.push(id);
      await this.store.put(cacheKeys.formats(valid), JSON.stringify(formats));
      this.logger.log(`Added format ${id} to ${valid}`);
    }
    return formats;
  }

  async removeFormatFromZip(zip: string, format: string): Promise<FormatId[]> {
    const valid = assertValidZip(zip);
    const { id } = getFormatConfig(format);
    if (id === DEFAULT_FORMAT) {
      throw new ConfigurationError(`Cannot remove default format ${DEFAULT_FORMAT}`);
    }

    const formats = await this.getFormatsForZip(valid);
    const remaining = formats.filter((enabled) => enabled !== id);

    if (remaining.length !== formats.length) {
      await this.store.put(cacheKeys.formats(valid), JSON.stringify(remaining));
      this.logger.log(`Removed format ${id} from ${valid}`);
    }
    return remaining;
  }
}
