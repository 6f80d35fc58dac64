import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url } = request;
    const now = Date.now();

    // Headers carry bearer tokens and OIDC credentials, so only the size is logged.
    this.logger.debug(
      `${method} ${url} content-length=${request.headers['content-length'] ?? 0}`,
    );

    return next.handle().pipe(
      tap({
        next: () => {
          const response = context.switchToHttp().getResponse<Response>();
          const delay = Date.now() - now;
          this.logger.log(`${method} ${url} ${response.statusCode} - ${delay}ms`);
        },
        error: (error: unknown) => {
          const delay = Date.now() - now;
          const status =
            error instanceof HttpException ? error.getStatus() : 500;
          this.logger.warn(`${method} ${url} ${status} - ${delay}ms`);
        },
      }),
    );
  }
}
