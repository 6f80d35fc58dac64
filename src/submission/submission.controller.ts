import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { BearerAuthGuard } from '../common/guards/bearer-auth.guard';
import { SubmissionService } from './submission.service';
import { SubmitJobDto } from './dto/submit-job.dto';
import { SubmitJobResponseDto } from './dto/submit-job-response.dto';
import { JobStatusResponseDto } from './dto/job-status-response.dto';

@Controller('v1/grade_jobs')
@UseGuards(BearerAuthGuard)
export class SubmissionController {
  private readonly logger = new Logger(SubmissionController.name);

  constructor(private readonly submissionService: SubmissionService) {}

  @Post('submit')
  @HttpCode(HttpStatus.ACCEPTED)
  async submit(@Body() request: SubmitJobDto): Promise<SubmitJobResponseDto> {
    this.logger.log(
      `Submission received for attempt ${request.attemptId} (${request.answers.length} answers)`,
    );
    return this.submissionService.submit(request);
  }

  @Get(':jobId')
  async getStatus(
    @Param('jobId', new ParseUUIDPipe()) jobId: string,
  ): Promise<JobStatusResponseDto> {
    return this.submissionService.getStatus(jobId);
  }
}
