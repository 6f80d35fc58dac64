import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { TokenPayload } from 'google-auth-library';
import { AppConfig } from '../../config/configuration';
import { errorMessage } from '../errors/grading.errors';
import { oidcAudience, OidcTokenVerifier } from '../auth/oidc-token.verifier';
import { extractBearerToken } from './bearer-auth.guard';

export const QUEUE_NAME_HEADER = 'x-cloudtasks-queuename';
export const RETRY_COUNT_HEADER = 'x-cloudtasks-taskretrycount';

/**
 * Admits only tasks dispatched from the configured queue: the queue header
 * must match and the request must carry an OIDC token issued to the task
 * service account for this worker's origin.
 */
@Injectable()
export class TaskQueueGuard implements CanActivate {
  private readonly logger = new Logger(TaskQueueGuard.name);
  private readonly queueName: string;
  private readonly audience: string;
  private readonly serviceAccountEmail: string;

  constructor(
    configService: ConfigService,
    private readonly verifier: OidcTokenVerifier,
  ) {
    const queue = configService.getOrThrow<AppConfig['queue']>('queue');
    this.queueName = queue.name;
    this.audience = oidcAudience(queue.workerUrl);
    this.serviceAccountEmail = queue.serviceAccountEmail;
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const caller = request.ip ?? 'unknown';

    if (request.headers[QUEUE_NAME_HEADER] !== this.queueName) {
      this.logger.warn(`Rejected worker call without queue header from ${caller}`);
      throw new ForbiddenException('task queue requests only');
    }

    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      this.logger.warn(`Rejected worker call without OIDC token from ${caller}`);
      throw new UnauthorizedException('unauthorized');
    }

    let payload: TokenPayload;
    try {
      payload = await this.verifier.verify(token, this.audience);
    } catch (error) {
      this.logger.warn(`Rejected worker call from ${caller}: ${errorMessage(error)}`);
      throw new UnauthorizedException('unauthorized');
    }

    if (
      payload.aud !== this.audience ||
      payload.email !== this.serviceAccountEmail ||
      payload.email_verified !== true
    ) {
      this.logger.warn(
        `Rejected worker call from ${caller}: token for ${payload.email ?? 'no email'} (aud ${payload.aud})`,
      );
      throw new ForbiddenException('task queue requests only');
    }
    return true;
  }
}

export function parseRetryCount(header: string | string[] | undefined): number {
  const raw = Array.isArray(header) ? header[0] : header;
  const parsed = raw === undefined ? NaN : parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : 0;
}
