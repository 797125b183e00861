import { Module } from '@nestjs/common';
import { QueuesModule } from '../queues/queues.module';
import { JobDispatcherProcessor } from './job-dispatcher.processor';
import { JobDispatcherService } from './job-dispatcher.service';

@Module({
  imports: [QueuesModule],
  providers: [JobDispatcherService, JobDispatcherProcessor],
})
export class DispatcherModule {}
