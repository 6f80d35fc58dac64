import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CompletionNotifierService } from './completion-notifier.service';

@Module({
  imports: [ConfigModule],
  providers: [CompletionNotifierService],
  exports: [CompletionNotifierService],
})
export class NotificationModule {}
