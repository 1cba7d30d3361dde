import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Inject } from "@nestjs/common";
import { LadderError } from "@ladder-lottery/core-errors";
import { ILogger, LOGGER } from "@ladder-lottery/core-logging";

interface JsonResponse {
  status(code: number): { json(body: unknown): void };
}

@Catch(LadderError)
export class LadderErrorFilter implements ExceptionFilter<LadderError> {
  constructor(@Inject(LOGGER) private readonly logger: ILogger) {}

  catch(exception: LadderError, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<{ traceId?: string; url?: string }>();
    this.logger.warn("ladder.rejected", {
      traceId: request.traceId,
      url: request.url,
      code: exception.code,
      message: exception.message,
    });
    http.getResponse<JsonResponse>().status(HttpStatus.BAD_REQUEST).json(exception.toPayload());
  }
}
