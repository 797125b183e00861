import { Module } from '@nestjs/common';
import { BullModule, type RegisterQueueAsyncOptions } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import {
  QUEUE_FETCH_JOBS,
  QUEUE_LANDSCAPE_JOBS,
  QUEUE_WEATHER_READY,
  QUEUE_ZIP_SCHEDULER,
} from '@weatherscape/queue-jobs';

function stageQueue(name: string): RegisterQueueAsyncOptions {
  return {
    name,
    inject: [ConfigService],
    useFactory: (configService: ConfigService) => ({
      defaultJobOptions: {
        attempts: configService.get<number>('pipeline.maxAttempts', 5),
        backoff: { type: 'exponential', delay: configService.get<number>('pipeline.backoffMs', 2000) },
        removeOnComplete: 100,
        removeOnFail: 50,
      },
    }),
  };
}

@Module({
  imports: [
    BullModule.registerQueue({
      name: QUEUE_ZIP_SCHEDULER,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: 100,
        removeOnFail: 50,
      },
    }),
    BullModule.registerQueueAsync(
      stageQueue(QUEUE_FETCH_JOBS),
      stageQueue(QUEUE_WEATHER_READY),
      stageQueue(QUEUE_LANDSCAPE_JOBS),
    ),
  ],
  exports: [BullModule],
})
export class QueuesModule {}
