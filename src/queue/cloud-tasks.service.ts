import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CloudTasksClient, protos } from '@google-cloud/tasks';
import { AppConfig, RetryConfig } from '../config/configuration';
import {
  errorMessage,
  TransientExternalError,
} from '../common/errors/grading.errors';
import { withRetry } from '../common/utils/retry.util';
import { oidcAudience } from '../common/auth/oidc-token.verifier';
import { GradeTaskPayload } from './interfaces/grade-task.interface';

// google.rpc.Code values surfaced on gRPC errors.
const ALREADY_EXISTS = 6;
const RETRYABLE_CODES = new Set([4, 8, 13, 14]); // DEADLINE_EXCEEDED, RESOURCE_EXHAUSTED, INTERNAL, UNAVAILABLE

function grpcCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'number' ? code : undefined;
  }
  return undefined;
}

export interface EnqueueResult {
  taskName: string;
  alreadyQueued: boolean;
}

@Injectable()
export class CloudTasksService {
  private readonly logger = new Logger(CloudTasksService.name);
  private readonly client = new CloudTasksClient();
  private readonly queue: AppConfig['queue'];
  private readonly retry: RetryConfig;

  constructor(configService: ConfigService) {
    this.queue = configService.getOrThrow<AppConfig['queue']>('queue');
    this.retry = configService.getOrThrow<RetryConfig>('retry');
  }

  /**
   * Creates one task per job. The task is named after the job id, so a
   * repeated create for the same job is rejected by Cloud Tasks and reported
   * here as `alreadyQueued`.
   */
  async enqueueGradeTask(payload: GradeTaskPayload): Promise<EnqueueResult> {
    const { projectId, location, name, workerUrl, serviceAccountEmail } =
      this.queue;
    const parent = this.client.queuePath(projectId, location, name);
    const taskName = this.client.taskPath(projectId, location, name, payload.jobId);

    const task: protos.google.cloud.tasks.v2.ITask = {
      name: taskName,
      httpRequest: {
        httpMethod: 'POST',
        url: workerUrl,
        headers: { 'Content-Type': 'application/json' },
        body: Buffer.from(JSON.stringify(payload)),
        oidcToken: {
          serviceAccountEmail,
          audience: oidcAudience(workerUrl),
        },
      },
    };

    try {
      await withRetry(() => this.client.createTask({ parent, task }), {
        maxAttempts: this.retry.maxAttempts,
        baseDelay: this.retry.baseDelayMs,
        maxDelay: this.retry.maxDelayMs,
        isRetryable: (error) => RETRYABLE_CODES.has(grpcCode(error) ?? -1),
        onRetry: (error, attempt) =>
          this.logger.warn(
            `createTask attempt ${attempt} for job ${payload.jobId} failed: ${errorMessage(error)}`,
          ),
      });
    } catch (error) {
      if (grpcCode(error) === ALREADY_EXISTS) {
        this.logger.log(`Task for job ${payload.jobId} already exists`);
        return { taskName, alreadyQueued: true };
      }
      throw new TransientExternalError(
        `Cloud Tasks error for ${parent}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    this.logger.log(`Enqueued grading task for job ${payload.jobId}`);
    return { taskName, alreadyQueued: false };
  }
}
