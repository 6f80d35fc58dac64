import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { errorMessage } from '../common/errors/grading.errors';
import {
  GradingJob,
  questionKey,
} from '../jobs/interfaces/grading-job.interface';
import { DEFAULT_PURPOSE, toNewGradingJob, toTaskPayload } from '../jobs/job-payload';
import { JobRepository } from '../jobs/repositories/job.repository';
import { CloudTasksService } from '../queue/cloud-tasks.service';
import { JobStatusResponseDto } from './dto/job-status-response.dto';
import { SubmitJobDto } from './dto/submit-job.dto';
import { SubmitJobResponseDto } from './dto/submit-job-response.dto';

@Injectable()
export class SubmissionService {
  private readonly logger = new Logger(SubmissionService.name);

  constructor(
    private readonly jobs: JobRepository,
    private readonly taskQueue: CloudTasksService,
  ) {}

  /**
   * Persists the job as `queued` and enqueues its grading task. Returns as
   * soon as the task exists; grading happens on the worker.
   */
  async submit(request: SubmitJobDto): Promise<SubmitJobResponseDto> {
    this.assertUniqueQuestions(request);

    const purpose = request.purpose ?? DEFAULT_PURPOSE;
    const existing = request.jobId
      ? await this.jobs.findById(request.jobId)
      : await this.jobs.findActiveByAttempt(request.attemptId, purpose);
    if (existing) {
      this.logger.log(
        `Attempt ${request.attemptId} already has job ${existing.id} (${existing.status})`,
      );
      return this.toResponse(existing);
    }

    const jobId = request.jobId ?? randomUUID();
    const { job, created } = await this.jobs.create(
      toNewGradingJob({ ...request, jobId, purpose }),
    );
    if (!created) {
      return this.toResponse(job);
    }

    try {
      await this.taskQueue.enqueueGradeTask(toTaskPayload(job));
    } catch (error) {
      this.logger.error(`Enqueue failed for job ${jobId}: ${errorMessage(error)}`);
      await this.discardUnqueued(jobId);
      throw new ServiceUnavailableException('Grading queue is unavailable');
    }

    this.logger.log(
      `Job ${jobId} queued for attempt ${request.attemptId} (${job.answers.length} answers)`,
    );
    return this.toResponse(job);
  }

  async getStatus(jobId: string): Promise<JobStatusResponseDto> {
    const job = await this.jobs.findById(jobId);
    if (!job) {
      throw new NotFoundException(`Job ${jobId} not found`);
    }
    return JobStatusResponseDto.fromJob(job);
  }

  private async discardUnqueued(jobId: string): Promise<void> {
    try {
      const discarded = await this.jobs.discard(jobId);
      if (!discarded) {
        this.logger.warn(`Job ${jobId} left the queued state before it could be discarded`);
      }
    } catch (error) {
      this.logger.error(`Could not discard job ${jobId}: ${errorMessage(error)}`);
    }
  }

  private assertUniqueQuestions(request: SubmitJobDto): void {
    const seen = new Set<string>();
    for (const answer of request.answers) {
      const key = questionKey(answer);
      if (seen.has(key)) {
        throw new BadRequestException(`Duplicate answer for question ${key}`);
      }
      seen.add(key);
    }
  }

  private toResponse(job: GradingJob): SubmitJobResponseDto {
    return { jobId: job.id, status: job.status };
  }
}
