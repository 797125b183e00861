import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ImageArtifact } from '@weatherscape/entities';
import { ARTIFACT_STORE } from './artifact-store.interface';
import { TypeOrmArtifactStore } from './typeorm-artifact.store';

@Module({
  imports: [TypeOrmModule.forFeature([ImageArtifact])],
  providers: [
    {
      provide: ARTIFACT_STORE,
      useClass: TypeOrmArtifactStore,
    },
  ],
  exports: [ARTIFACT_STORE],
})
export class ArtifactStoreModule {}
