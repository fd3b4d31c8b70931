import {
  type CallHandler,
  type ExecutionContext,
  Injectable,
  Logger,
  type NestInterceptor,
} from "@nestjs/common";
import type { Request, Response } from "express";
import { type Observable, tap } from "rxjs";
import { getCorrelationId, getRequestElapsedMs } from "../request-context";

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger("HTTP");

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const interceptedAt = Date.now();
    const line = (status: number | string) => {
      const elapsed = getRequestElapsedMs() ?? Date.now() - interceptedAt;
      return (
        `[${getCorrelationId() ?? "-"}] ${request.method} ` +
        `${request.originalUrl} ${status} ${elapsed}ms`
      );
    };

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(line(http.getResponse<Response>().statusCode));
        },
        error: (error: unknown) => {
          const status =
            typeof error === "object" && error !== null && "status" in error
              ? String(error.status)
              : "500";
          this.logger.warn(line(status));
        },
      }),
    );
  }
}
