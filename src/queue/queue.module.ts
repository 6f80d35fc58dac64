import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CloudTasksService } from './cloud-tasks.service';

@Module({
  imports: [ConfigModule],
  providers: [CloudTasksService],
  exports: [CloudTasksService],
})
export class QueueModule {}
