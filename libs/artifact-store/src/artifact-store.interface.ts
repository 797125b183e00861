import type { ArtifactMetadata } from '@weatherscape/cache-store';

export interface ArtifactUpload {
  contentType: string;
  metadata: ArtifactMetadata;
}

export interface StoredArtifact {
  key: string;
  data: Buffer;
  contentType: string;
  metadata: ArtifactMetadata;
}

/**
 * Blob store with exactly one live object per key. `put` replaces any
 * previous object and its metadata.
 */
export interface ArtifactStore {
  put(key: string, bytes: Buffer, upload: ArtifactUpload): Promise<void>;
  get(key: string): Promise<StoredArtifact | null>;
}

export const ARTIFACT_STORE = Symbol('ARTIFACT_STORE');
