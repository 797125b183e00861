import { Module } from '@nestjs/common';
import { ArtifactStoreModule } from '@weatherscape/artifact-store';
import { LandscapeRendererModule } from '@weatherscape/landscape-renderer';
import { LandscapeGeneratorProcessor } from './landscape-generator.processor';
import { LandscapeGeneratorService } from './landscape-generator.service';

@Module({
  imports: [ArtifactStoreModule, LandscapeRendererModule.register()],
  providers: [LandscapeGeneratorService, LandscapeGeneratorProcessor],
})
export class GeneratorModule {}
