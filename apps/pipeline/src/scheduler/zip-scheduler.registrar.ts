import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bullmq';
import { DEFAULT_SCHEDULER_INTERVAL_MINUTES } from '@weatherscape/config';
import { JOB_SCHEDULER_TICK, QUEUE_ZIP_SCHEDULER, ZIP_REFRESH_SCHEDULER_ID } from '@weatherscape/queue-jobs';

/**
 * Registers the repeatable tick. Upserting keeps a single scheduler no matter
 * how many instances boot.
 */
@Injectable()
export class ZipSchedulerRegistrar implements OnApplicationBootstrap {
  private readonly logger = new Logger(ZipSchedulerRegistrar.name);

  constructor(
    @InjectQueue(QUEUE_ZIP_SCHEDULER)
    private readonly schedulerQueue: Queue,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const minutes = this.configService.get<number>(
      'pipeline.schedulerIntervalMinutes',
      DEFAULT_SCHEDULER_INTERVAL_MINUTES,
    );

    await this.schedulerQueue.upsertJobScheduler(
      ZIP_REFRESH_SCHEDULER_ID,
      { every: minutes * 60 * 1000 },
      { name: JOB_SCHEDULER_TICK, opts: { attempts: 1 } },
    );
    this.logger.log(`ZIP refresh scheduled every ${minutes} minute(s)`);
  }
}
