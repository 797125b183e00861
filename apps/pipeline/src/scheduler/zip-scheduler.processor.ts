import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { QUEUE_ZIP_SCHEDULER } from '@weatherscape/queue-jobs';
import { ZipSchedulerService } from './zip-scheduler.service';

@Processor(QUEUE_ZIP_SCHEDULER)
export class ZipSchedulerProcessor extends WorkerHost {
  private readonly logger = new Logger(ZipSchedulerProcessor.name);

  constructor(private readonly scheduler: ZipSchedulerService) {
    super();
  }

  async process(job: Job): Promise<void> {
    this.logger.debug(`Scheduler tick ${job.id ?? job.name}`);
    await this.scheduler.tick();
  }
}
