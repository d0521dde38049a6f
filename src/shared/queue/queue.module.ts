import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JOB_QUEUE, QueueDriver } from './queue.constants';
import { JobQueue } from './interfaces/job-queue.interface';
import { InProcessJobQueue } from './in-process-job.queue';
import { BullMqJobQueue } from './bullmq-job.queue';

@Module({
  providers: [
    {
      provide: JOB_QUEUE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): JobQueue => {
        const driver =
          configService.get<QueueDriver>('QUEUE_DRIVER') ?? 'memory';
        const concurrency =
          configService.get<number>('WORKER_CONCURRENCY') || 4;

        if (driver === 'bullmq') {
          return new BullMqJobQueue(
            {
              host: configService.get<string>('REDIS_HOST') || 'localhost',
              port: configService.get<number>('REDIS_PORT') || 6379,
            },
            concurrency,
          );
        }
        return new InProcessJobQueue(concurrency);
      },
    },
  ],
  exports: [JOB_QUEUE],
})
export class QueueModule {}
