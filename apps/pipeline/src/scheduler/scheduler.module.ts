import { Module } from '@nestjs/common';
import { QueuesModule } from '../queues/queues.module';
import { ZipSchedulerProcessor } from './zip-scheduler.processor';
import { ZipSchedulerRegistrar } from './zip-scheduler.registrar';
import { ZipSchedulerService } from './zip-scheduler.service';

@Module({
  imports: [QueuesModule],
  providers: [ZipSchedulerService, ZipSchedulerProcessor, ZipSchedulerRegistrar],
  exports: [ZipSchedulerService],
})
export class SchedulerModule {}
