import { Module, type DynamicModule } from '@nestjs/common'
import { LandscapeRendererService } from './landscape-renderer.service'
import { LANDSCAPE_RENDERER } from './landscape-renderer.types'

@Module({})
export class LandscapeRendererModule {
  static register(): DynamicModule {
    return {
      module: LandscapeRendererModule,
      providers: [
        {
          provide: LANDSCAPE_RENDERER,
          useClass: LandscapeRendererService,
        },
      ],
      exports: [LANDSCAPE_RENDERER],
    }
  }
}
