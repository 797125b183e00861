import type { FormatId } from '@weatherscape/formats';

export type PipelineStage = 'scheduler' | 'fetcher' | 'dispatcher' | 'generator';

export const ACTIVE_ZIPS_KEY = 'active_zips';

export const cacheKeys = {
  activeZips: () => ACTIVE_ZIPS_KEY,
  formats: (zip: string) => `formats:${zip}`,
  geocode: (zip: string) => `geo:${zip}`,
  weather: (zip: string) => `weather:${zip}`,
  artifactMetadata: (zip: string, format: FormatId) => `metadata:${zip}:${format}`,
  status: (stage: PipelineStage) => `status:${stage}`,
};
