import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { configValidationSchema } from './config/validation.schema';
import { AppController } from './app.controller';
import { GradingModule } from './grading/grading.module';
import { SubmissionModule } from './submission/submission.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [configuration],
      validationSchema: configValidationSchema,
    }),
    SubmissionModule,
    GradingModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
