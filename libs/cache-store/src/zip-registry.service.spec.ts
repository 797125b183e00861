import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError, InvalidZipError, UnknownFormatError } from '@weatherscape/common';
import { createTestConfig, InMemoryKeyValueStore } from '@weatherscape/testing';
import { KEY_VALUE_STORE } from './key-value-store.interface';
import { ZipRegistryService } from './zip-registry.service';

describe('ZipRegistryService', () => {
  let store: InMemoryKeyValueStore;
  let registry: ZipRegistryService;

  async function createRegistry(defaultZips = ['78729']): Promise<ZipRegistryService> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        ZipRegistryService,
        { provide: KEY_VALUE_STORE, useValue: store },
        { provide: ConfigService, useValue: createTestConfig({ pipeline: { defaultZips } }) },
      ],
    }).compile();
    return moduleRef.get(ZipRegistryService);
  }

  beforeEach(async () => {
    store = new InMemoryKeyValueStore();
    registry = await createRegistry();
  });

  describe('getActiveZips', () => {
    it('seeds the set from the configured defaults when absent', async () => {
      await expect(registry.getActiveZips()).resolves.toEqual(['78729']);
      await expect(store.get('active_zips')).resolves.toBe('["78729"]');
    });

    it('seeds an empty set when no default is valid', async () => {
      registry = await createRegistry(['abc']);

      await expect(registry.getActiveZips()).resolves.toEqual([]);
      await expect(store.get('active_zips')).resolves.toBe('[]');
    });

    it('returns the stored set without the invalid or repeated entries', async () => {
      await store.put('active_zips', JSON.stringify(['10001', '1234', '10001', '94103']));

      await expect(registry.getActiveZips()).resolves.toEqual(['10001', '94103']);
    });

    it('keeps an explicitly empty set', async () => {
      await store.put('active_zips', '[]');

      await expect(registry.getActiveZips()).resolves.toEqual([]);
    });

    it('fails on a corrupt set', async () => {
      await store.put('active_zips', '{"zip":"78729"}');

      await expect(registry.getActiveZips()).rejects.toThrow(ConfigurationError);
    });
  });

  describe('addActiveZip / removeActiveZip', () => {
    it('adds a new ZIP once', async () => {
      await registry.addActiveZip(' 10001 ');
      await registry.addActiveZip('10001');

      await expect(store.get('active_zips')).resolves.toBe('["78729","10001"]');
    });

    it('rejects malformed ZIPs', async () => {
      await expect(registry.addActiveZip('7872')).rejects.toThrow(InvalidZipError);
    });

    it('removes a ZIP', async () => {
      await registry.addActiveZip('10001');

      await expect(registry.removeActiveZip('78729')).resolves.toEqual(['10001']);
      await expect(store.get('active_zips')).resolves.toBe('["10001"]');
    });
  });

  describe('getFormatsForZip', () => {
    it('defaults to the light format', async () => {
      await expect(registry.getFormatsForZip('78729')).resolves.toEqual(['rgb_light']);
    });

    it('falls back to the default on malformed JSON', async () => {
      await store.put('formats:78729', 'not json');

      await expect(registry.getFormatsForZip('78729')).resolves.toEqual(['rgb_light']);
    });

    it('drops unknown formats and prepends the default', async () => {
      await store.put('formats:78729', JSON.stringify(['bw', 'sepia', 'bw', 'eink']));

      await expect(registry.getFormatsForZip('78729')).resolves.toEqual(['rgb_light', 'bw', 'eink']);
    });

    it('keeps the stored order when the default is present', async () => {
      await store.put('formats:78729', JSON.stringify(['bw', 'rgb_light']));

      await expect(registry.getFormatsForZip('78729')).resolves.toEqual(['bw', 'rgb_light']);
    });
  });

  describe('format administration', () => {
    it('replaces the list, normalising names', async () => {
      await expect(registry.setFormatsForZip('78729', ['RGB-Dark', 'bw'])).resolves.toEqual([
        'rgb_light',
        'rgb_dark',
        'bw',
      ]);
      await expect(store.get('formats:78729')).resolves.toBe('["rgb_light","rgb_dark","bw"]');
    });

    it('rejects unknown formats', async () => {
      await expect(registry.setFormatsForZip('78729', ['sepia'])).rejects.toThrow(UnknownFormatError);
      await expect(registry.addFormatToZip('78729', 'sepia')).rejects.toThrow(UnknownFormatError);
    });

    it('adds and removes single formats', async () => {
      await expect(registry.addFormatToZip('78729', 'bwi')).resolves.toEqual(['rgb_light', 'bwi']);
      await expect(registry.removeFormatFromZip('78729', 'bwi')).resolves.toEqual(['rgb_light']);
      await expect(store.get('formats:78729')).resolves.toBe('["rgb_light"]');
    });

    it('never removes the default format', async () => {
      await expect(registry.removeFormatFromZip('78729', 'rgb_light')).rejects.toThrow(
        'Cannot remove default format rgb_light',
      );
    });
  });
});
