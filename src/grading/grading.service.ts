import {
  ConflictException,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { RetryConfig } from '../config/configuration';
import {
  errorMessage,
  UnrecoverableJobError,
} from '../common/errors/grading.errors';
import { mapWithConcurrency } from '../common/utils/concurrency.util';
import { isTransientError, withRetry } from '../common/utils/retry.util';
import {
  AnswerOutcome,
  AnswerSubmission,
  GradingJob,
  questionKey,
} from '../jobs/interfaces/grading-job.interface';
import { toNewGradingJob } from '../jobs/job-payload';
import { isTerminal } from '../jobs/job-status';
import { JobRepository } from '../jobs/repositories/job.repository';
import { CompletionNotifierService } from '../notification/completion-notifier.service';
import { GradeTaskPayload } from '../queue/interfaces/grade-task.interface';
import { ReportRendererService } from '../report/report-renderer.service';
import {
  GcsStorageService,
  reportObjectPath,
} from '../storage/gcs-storage.service';
import { AnswerGraderService } from './answer-grader.service';
import { GradeTaskResponseDto } from './dto/grade-task-response.dto';
import {
  computeUsage,
  fallbackOutcome,
  lookupSection,
  summarize,
} from './scoring';

export interface DeliveryContext {
  /** Cloud Tasks retry count; 0 on first delivery. */
  retryCount: number;
}

/**
 * Consumes grading tasks. Safe under at-least-once delivery: a lease claimed
 * by compare-and-set admits one worker per job, terminal jobs short-circuit,
 * and answers with a stored outcome are not graded again.
 */
@Injectable()
export class GradingService {
  private readonly logger = new Logger(GradingService.name);
  private readonly retry: RetryConfig;
  private readonly maxConcurrent: number;
  private readonly passThreshold: number;
  private readonly leaseMs: number;
  private readonly maxDeliveries: number;

  constructor(
    private readonly jobs: JobRepository,
    private readonly answerGrader: AnswerGraderService,
    private readonly reportRenderer: ReportRendererService,
    private readonly storage: GcsStorageService,
    private readonly notifier: CompletionNotifierService,
    configService: ConfigService,
  ) {
    this.retry = configService.getOrThrow<RetryConfig>('retry');
    this.maxConcurrent = configService.get<number>('grading.maxConcurrentAnswers', 4);
    this.passThreshold = configService.get<number>('grading.passThreshold', 0.7);
    this.leaseMs = configService.get<number>('grading.leaseMs', 600000);
    this.maxDeliveries = configService.get<number>('queue.maxDeliveries', 5);
  }

  async process(
    task: GradeTaskPayload,
    delivery: DeliveryContext = { retryCount: 0 },
  ): Promise<GradeTaskResponseDto> {
    const job = await this.loadOrCreate(task);

    if (job.id !== task.jobId) {
      this.logger.warn(
        `Task for job ${task.jobId} duplicates live job ${job.id} of attempt ${job.attemptId}`,
      );
      return this.toResponse(job, true);
    }

    if (isTerminal(job.status)) {
      this.logger.log(`Job ${job.id} already ${job.status}; ignoring duplicate delivery`);
      return this.toResponse(job, true);
    }

    const now = new Date();
    const leaseToken = randomUUID();
    const claimed = await this.jobs.claim(job.id, {
      token: leaseToken,
      now,
      expiresAt: new Date(now.getTime() + this.leaseMs),
    });

    if (!claimed) {
      const current = await this.jobs.findById(job.id);
      if (current && isTerminal(current.status)) {
        return this.toResponse(current, true);
      }
      throw new ConflictException(
        `Job ${job.id} is being processed by another worker`,
      );
    }

    this.logger.log(
      `Processing job ${claimed.id} (${claimed.answers.length} answers, delivery ${delivery.retryCount + 1})`,
    );

    try {
      return await this.gradeClaimedJob(claimed, leaseToken);
    } catch (error) {
      return this.handleFailure(claimed, leaseToken, error, delivery);
    }
  }

  private async loadOrCreate(task: GradeTaskPayload): Promise<GradingJob> {
    const existing = await this.jobs.findById(task.jobId);
    if (existing) {
      return existing;
    }
    this.logger.warn(`Job ${task.jobId} not found; creating it from the task payload`);
    const { job } = await this.jobs.create(toNewGradingJob(task));
    return job;
  }

  private async gradeClaimedJob(
    job: GradingJob,
    leaseToken: string,
  ): Promise<GradeTaskResponseDto> {
    const outcomes = await this.gradeAnswers(job);

    if (outcomes.every((o) => o.fallback)) {
      throw new UnrecoverableJobError(
        `All ${outcomes.length} answer(s) failed grading`,
      );
    }

    const overall = summarize(outcomes, this.passThreshold, this.answerGrader.gradingMode);
    const usage = computeUsage(outcomes);
    const generatedAt = new Date();

    const pdf = await this.reportRenderer.render({
      jobId: job.id,
      attemptId: job.attemptId,
      outcomes,
      overall,
      generatedAt,
    });
    const stored = await this.retryExternal('upload report', () =>
      this.storage.uploadBuffer(
        pdf,
        reportObjectPath(job.id, generatedAt),
        'application/pdf',
      ),
    );
    await this.retryExternal('record artifact', () =>
      this.jobs.recordArtifact({
        jobId: job.id,
        kind: 'pdf',
        storagePath: stored.path,
        sizeBytes: stored.sizeBytes,
        sha256: stored.sha256,
      }),
    );

    const completedAt = new Date();
    let completed = await this.retryExternal('complete job', () =>
      this.jobs.transition(job.id, {
        from: 'processing',
        to: 'completed',
        leaseToken,
        patch: {
          completedAt,
          reportPath: stored.path,
          overall,
          usage,
        },
      }),
    );

    if (!completed) {
      const current = await this.jobs.findById(job.id);
      // A retried write finds nothing to move when the first one landed but its reply was lost.
      if (
        current?.status === 'completed' &&
        current.reportPath === stored.path &&
        current.completedAt?.getTime() === completedAt.getTime()
      ) {
        completed = current;
      } else {
        this.logger.warn(`Lost lease on job ${job.id} before completion`);
        return this.toResponse(current ?? job, true);
      }
    }

    this.logger.log(
      `Job ${job.id} completed: score ${overall.score.toFixed(2)} (${overall.band}), ${
        outcomes.filter((o) => o.fallback).length
      } fallback(s)`,
    );
    await this.notifyTerminal(completed, outcomes);
    return this.toResponse(completed, false);
  }

  private async gradeAnswers(job: GradingJob): Promise<AnswerOutcome[]> {
    const stored = new Map<string, AnswerOutcome>();
    for (const outcome of await this.jobs.listOutcomes(job.id)) {
      // Fallbacks from an earlier delivery get another chance.
      if (!outcome.fallback) {
        stored.set(questionKey(outcome), outcome);
      }
    }
    if (stored.size > 0) {
      this.logger.log(
        `Job ${job.id}: reusing ${stored.size} outcome(s) from an earlier delivery`,
      );
    }

    return mapWithConcurrency(job.answers, this.maxConcurrent, async (answer) => {
      const previous = stored.get(questionKey(answer));
      if (previous) {
        return previous;
      }
      const outcome = await this.gradeOne(job, answer);
      await this.retryExternal('save outcome', () =>
        this.jobs.saveOutcome(job.id, outcome),
      );
      return outcome;
    });
  }

  private async gradeOne(
    job: GradingJob,
    answer: AnswerSubmission,
  ): Promise<AnswerOutcome> {
    const key = questionKey(answer);
    const section = lookupSection(job.sectionMap, answer);

    try {
      const graded = await withRetry(
        () => this.answerGrader.grade(answer, job.rubric),
        {
          maxAttempts: this.retry.maxAttempts,
          baseDelay: this.retry.baseDelayMs,
          maxDelay: this.retry.maxDelayMs,
          onRetry: (error, attempt, delay) =>
            this.logger.warn(
              `Job ${job.id} answer ${key} attempt ${attempt} failed (${errorMessage(error)}); retrying in ${delay}ms`,
            ),
        },
      );
      return {
        questionType: answer.questionType,
        questionId: answer.questionId,
        section,
        ...graded,
        fallback: false,
      };
    } catch (error) {
      this.logger.warn(
        `Job ${job.id} answer ${key} could not be graded: ${errorMessage(error)}`,
      );
      return fallbackOutcome(answer, section, errorMessage(error));
    }
  }

  private async handleFailure(
    job: GradingJob,
    leaseToken: string,
    error: unknown,
    delivery: DeliveryContext,
  ): Promise<GradeTaskResponseDto> {
    const message = errorMessage(error);
    const isLastDelivery = delivery.retryCount + 1 >= this.maxDeliveries;

    if (isTransientError(error) && !isLastDelivery) {
      this.logger.warn(
        `Job ${job.id} hit a transient failure on delivery ${delivery.retryCount + 1}: ${message}`,
      );
      try {
        await this.jobs.releaseLease(job.id, leaseToken);
      } catch (releaseError) {
        this.logger.warn(
          `Could not release lease on job ${job.id}; it expires on its own: ${errorMessage(releaseError)}`,
        );
      }
      throw new ServiceUnavailableException(
        `Job ${job.id} will be retried: ${message}`,
      );
    }

    this.logger.error(`Job ${job.id} failed: ${message}`);
    const failed = await this.jobs.transition(job.id, {
      from: 'processing',
      to: 'failed',
      leaseToken,
      patch: { completedAt: new Date(), error: message },
    });
    if (!failed) {
      const current = await this.jobs.findById(job.id);
      return this.toResponse(current ?? job, true);
    }

    let outcomes: AnswerOutcome[] = [];
    try {
      outcomes = await this.jobs.listOutcomes(job.id);
    } catch (listError) {
      this.logger.warn(
        `Could not load outcomes for failed job ${job.id}: ${errorMessage(listError)}`,
      );
    }
    await this.notifyTerminal(failed, outcomes);
    return this.toResponse(failed, false);
  }

  private async notifyTerminal(
    job: GradingJob,
    outcomes: readonly AnswerOutcome[],
  ): Promise<void> {
    const result = await this.notifier.notify(job, outcomes);
    if (result.skipped) {
      return;
    }
    try {
      await this.jobs.recordNotification(job.id, {
        delivered: result.delivered,
        at: new Date(),
        error: result.error,
      });
    } catch (error) {
      this.logger.warn(
        `Could not record webhook state for job ${job.id}: ${errorMessage(error)}`,
      );
    }
  }

  private retryExternal<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      maxAttempts: this.retry.maxAttempts,
      baseDelay: this.retry.baseDelayMs,
      maxDelay: this.retry.maxDelayMs,
      onRetry: (error, attempt) =>
        this.logger.warn(`${operation} attempt ${attempt} failed: ${errorMessage(error)}`),
    });
  }

  private toResponse(job: GradingJob, duplicate: boolean): GradeTaskResponseDto {
    return {
      jobId: job.id,
      status: job.status,
      duplicate,
      reportPath: job.reportPath,
      error: job.error,
    };
  }
}
