import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { GradingController } from './grading.controller';
import { GradingService } from './grading.service';
import { AnswerGraderService } from './answer-grader.service';
import { GeminiService } from './gemini/gemini.service';
import { OidcTokenVerifier } from '../common/auth/oidc-token.verifier';
import { JobsModule } from '../jobs/jobs.module';
import { ReportModule } from '../report/report.module';
import { StorageModule } from '../storage/storage.module';
import { NotificationModule } from '../notification/notification.module';

@Module({
  imports: [
    ConfigModule,
    JobsModule,
    ReportModule,
    StorageModule,
    NotificationModule,
  ],
  controllers: [GradingController],
  providers: [
    GradingService,
    AnswerGraderService,
    GeminiService,
    OidcTokenVerifier,
  ],
  exports: [GradingService],
})
export class GradingModule {}
