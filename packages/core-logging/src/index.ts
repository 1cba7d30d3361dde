import { CallHandler, ExecutionContext, Global, Inject, Injectable, Module, NestInterceptor } from "@nestjs/common";
import pino, { Logger as PinoLoggerInstance } from "pino";
import { randomUUID } from "crypto";
import { Observable, tap } from "rxjs";

export interface ILogger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export interface LogContext extends Record<string, unknown> {
  traceId?: string;
  seed?: string;
  playerCount?: number;
  levelCount?: number;
}

export interface PinoLoggerOptions {
  level?: string;
  service?: string;
}

export const LOGGER = Symbol("LOGGER");

export class PinoLogger implements ILogger {
  private readonly logger: PinoLoggerInstance;

  constructor(options: PinoLoggerOptions = {}) {
    this.logger = pino({
      level: options.level ?? process.env.LOG_LEVEL ?? "info",
      base: { service: options.service ?? "ladder-lottery" },
    });
  }

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.info(meta, msg);
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.warn(meta, msg);
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.error(meta, msg);
  }
}

interface TracedRequest {
  method?: string;
  url?: string;
  headers: Record<string, string | string[] | undefined>;
  traceId?: string;
}

@Injectable()
export class CorrelationIdInterceptor implements NestInterceptor<unknown, unknown> {
  constructor(@Inject(LOGGER) private readonly logger: ILogger) {}

  intercept(context: ExecutionContext, next: CallHandler<unknown>): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<TracedRequest>();
    const response = http.getResponse<{ setHeader?: (key: string, value: string) => void }>();

    const traceIdHeader = request.headers["x-trace-id"];
    const traceId = (Array.isArray(traceIdHeader) ? traceIdHeader[0] : traceIdHeader) ?? randomUUID();
    request.traceId = traceId;
    if (typeof response.setHeader === "function") {
      response.setHeader("x-trace-id", traceId);
    }

    const route: LogContext = { traceId, method: request.method, url: request.url };
    const start = Date.now();
    return next.handle().pipe(
      tap({
        next: () => this.logger.info("request.completed", { ...route, durationMs: Date.now() - start }),
        error: (err: unknown) =>
          this.logger.error("request.error", {
            ...route,
            durationMs: Date.now() - start,
            err: err instanceof Error ? err.message : String(err),
          }),
      }),
    );
  }
}

@Global()
@Module({
  providers: [
    {
      provide: LOGGER,
      useFactory: () => new PinoLogger(),
    },
    CorrelationIdInterceptor,
  ],
  exports: [LOGGER, CorrelationIdInterceptor],
})
export class LoggingModule {}
