import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ImageArtifact } from '@weatherscape/entities';
import { isFormatId } from '@weatherscape/formats';
import type { ArtifactStore, ArtifactUpload, StoredArtifact } from './artifact-store.interface';

@Injectable()
export class TypeOrmArtifactStore implements ArtifactStore {
  private readonly logger = new Logger(TypeOrmArtifactStore.name);

  constructor(
    @InjectRepository(ImageArtifact)
    private readonly artifactRepository: Repository<ImageArtifact>,
  ) {}

  async put(key: string, bytes: Buffer, upload: ArtifactUpload): Promise<void> {
    const { metadata } = upload;

    await this.artifactRepository.upsert(
      {
        key,
        zip: metadata.zip,
        format: metadata.formatVariant,
        contentType: upload.contentType,
        data: bytes,
        byteSize: metadata.byteSize,
        lat: metadata.lat,
        lon: metadata.lon,
        generatedAt: new Date(metadata.generatedAt),
      },
      ['key'],
    );

    this.logger.debug(`Stored ${key} (${bytes.length} bytes)`);
  }

  async get(key: string): Promise<StoredArtifact | null> {
    const artifact = await this.artifactRepository.findOne({ where: { key } });
    if (!artifact) {
      return null;
    }
    if (!isFormatId(artifact.format)) {
      this.logger.warn(`Artifact ${key} has unknown format ${artifact.format}`);
      return null;
    }

    return {
      key: artifact.key,
      data: artifact.data,
      contentType: artifact.contentType,
      metadata: {
        generatedAt: artifact.generatedAt.toISOString(),
        lat: artifact.lat,
        lon: artifact.lon,
        zip: artifact.zip,
        byteSize: artifact.byteSize,
        formatVariant: artifact.format,
      },
    };
  }
}
