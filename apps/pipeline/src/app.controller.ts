import { Controller, Get } from '@nestjs/common';
import { Clock } from '@weatherscape/common';
import { StatusService, type PipelineStage, type StatusRecord } from '@weatherscape/cache-store';

const STAGES: PipelineStage[] = ['scheduler', 'fetcher', 'dispatcher', 'generator'];

@Controller()
export class AppController {
  constructor(
    private readonly status: StatusService,
    private readonly clock: Clock,
  ) {}

  @Get()
  health() {
    return { status: 'ok', timestamp: this.clock.now().toISOString() };
  }

  @Get('status')
  async stages(): Promise<Record<PipelineStage, StatusRecord | null>> {
    const [scheduler, fetcher, dispatcher, generator] = await Promise.all(
      STAGES.map((stage) => this.status.read(stage)),
    );
    return { scheduler, fetcher, dispatcher, generator };
  }
}
