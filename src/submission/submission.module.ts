import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SubmissionController } from './submission.controller';
import { SubmissionService } from './submission.service';
import { JobsModule } from '../jobs/jobs.module';
import { QueueModule } from '../queue/queue.module';

@Module({
  imports: [ConfigModule, JobsModule, QueueModule],
  controllers: [SubmissionController],
  providers: [SubmissionService],
})
export class SubmissionModule {}
