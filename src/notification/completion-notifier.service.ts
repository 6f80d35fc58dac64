import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import {
  errorMessage,
  TransientExternalError,
} from '../common/errors/grading.errors';
import { withRetry } from '../common/utils/retry.util';
import {
  AnswerOutcome,
  GradingJob,
  OverallResult,
  TerminalJobStatus,
} from '../jobs/interfaces/grading-job.interface';
import { isTerminal } from '../jobs/job-status';
import {
  KEY_ID_HEADER,
  SIGNATURE_HEADER,
  signWebhookPayload,
  TIMESTAMP_HEADER,
} from './webhook-signature';

export interface WebhookEvent {
  jobId: string;
  attemptId: string;
  userId: string;
  status: TerminalJobStatus;
  timestamp: string;
  grades: Array<
    Pick<
      AnswerOutcome,
      | 'questionType'
      | 'questionId'
      | 'section'
      | 'score'
      | 'rationale'
      | 'tags'
      | 'fallback'
    >
  >;
  overall: OverallResult | null;
  artifacts: { reportPath: string | null };
  error: string | null;
}

export interface NotificationResult {
  delivered: boolean;
  skipped: boolean;
  attempts: number;
  error?: string;
}

/** A 4xx other than 408/429: the receiver refused the payload itself. */
export class WebhookRejectedError extends Error {
  constructor(readonly status: number) {
    super(`Webhook rejected with HTTP ${status}`);
    this.name = 'WebhookRejectedError';
  }
}

@Injectable()
export class CompletionNotifierService {
  private readonly logger = new Logger(CompletionNotifierService.name);
  private readonly config: AppConfig['webhook'];
  private readonly baseDelay: number;
  private readonly maxDelay: number;

  constructor(configService: ConfigService) {
    this.config = configService.getOrThrow<AppConfig['webhook']>('webhook');
    this.baseDelay = configService.get<number>('retry.baseDelayMs', 1000);
    this.maxDelay = configService.get<number>('retry.maxDelayMs', 10000);
  }

  buildEvent(
    job: GradingJob,
    outcomes: readonly AnswerOutcome[],
    at: Date,
  ): WebhookEvent {
    if (!isTerminal(job.status)) {
      throw new Error(`Job ${job.id} is not terminal (${job.status})`);
    }
    return {
      jobId: job.id,
      attemptId: job.attemptId,
      userId: job.userId,
      status: job.status,
      timestamp: at.toISOString(),
      grades: outcomes.map((o) => ({
        questionType: o.questionType,
        questionId: o.questionId,
        section: o.section,
        score: o.score,
        rationale: o.rationale,
        tags: o.tags,
        fallback: o.fallback,
      })),
      overall: job.overall,
      artifacts: { reportPath: job.reportPath },
      error: job.error,
    };
  }

  /**
   * Best effort: resolves with the outcome of the delivery and never throws,
   * so a failed notification cannot alter the job's recorded state.
   */
  async notify(
    job: GradingJob,
    outcomes: readonly AnswerOutcome[],
  ): Promise<NotificationResult> {
    const url = job.callbackUrl ?? this.config.defaultUrl;
    if (!url) {
      this.logger.debug(`No callback URL for job ${job.id}; skipping webhook`);
      return { delivered: false, skipped: true, attempts: 0 };
    }

    let attempts = 0;
    try {
      const now = new Date();
      const raw = JSON.stringify(this.buildEvent(job, outcomes, now));
      const timestamp = Math.floor(now.getTime() / 1000);
      const headers = {
        'Content-Type': 'application/json',
        [SIGNATURE_HEADER]: signWebhookPayload(this.config.secret, timestamp, raw),
        [TIMESTAMP_HEADER]: String(timestamp),
        [KEY_ID_HEADER]: this.config.keyId,
      };

      await withRetry(
        async (attempt) => {
          attempts = attempt;
          await this.post(url, raw, headers);
        },
        {
          maxAttempts: this.config.maxAttempts,
          baseDelay: this.baseDelay,
          maxDelay: this.maxDelay,
          isRetryable: (error) => error instanceof TransientExternalError,
          onRetry: (error, attempt, delay) =>
            this.logger.warn(
              `Webhook attempt ${attempt} for job ${job.id} failed (${errorMessage(error)}); retrying in ${delay}ms`,
            ),
        },
      );
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(
        `Webhook for job ${job.id} failed after ${attempts} attempt(s): ${message}`,
      );
      return { delivered: false, skipped: false, attempts, error: message };
    }

    this.logger.log(`Webhook delivered for job ${job.id} (${job.status})`);
    return { delivered: true, skipped: false, attempts };
  }

  private async post(
    url: string,
    body: string,
    headers: Record<string, string>,
  ): Promise<void> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new TransientExternalError(
        `Webhook transport failure: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (response.ok) {
      return;
    }
    if (
      response.status >= 500 ||
      response.status === 408 ||
      response.status === 429
    ) {
      throw new TransientExternalError(`Webhook returned HTTP ${response.status}`);
    }
    throw new WebhookRejectedError(response.status);
  }
}
