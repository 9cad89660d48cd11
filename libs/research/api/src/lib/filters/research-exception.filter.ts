import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { FailureKind } from '@equity-research/shared/types';
import { ResearchError } from '@equity-research/shared/utils';

export const FAILURE_STATUS: Record<FailureKind, HttpStatus> = {
  [FailureKind.CAPACITY_EXCEEDED]: HttpStatus.SERVICE_UNAVAILABLE,
  [FailureKind.SESSION_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [FailureKind.SESSION_EXPIRED]: HttpStatus.GONE,
  [FailureKind.TICKER_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [FailureKind.RATE_LIMITED]: HttpStatus.TOO_MANY_REQUESTS,
  [FailureKind.RESEARCH_FAILED]: HttpStatus.BAD_GATEWAY,
  [FailureKind.PROVIDER_UNAVAILABLE]: HttpStatus.BAD_GATEWAY,
  [FailureKind.SERVICE_UNAVAILABLE]: HttpStatus.BAD_GATEWAY,
  [FailureKind.PERSISTENCE_FAILED]: HttpStatus.INTERNAL_SERVER_ERROR,
  [FailureKind.CANCELLED]: HttpStatus.CONFLICT,
};

export interface ResearchErrorBody {
  statusCode: number;
  kind: FailureKind;
  message: string;
}

/**
 * Maps research faults to HTTP responses by failure kind
 */
@Catch(ResearchError)
export class ResearchExceptionFilter implements ExceptionFilter<ResearchError> {
  private readonly logger = new Logger(ResearchExceptionFilter.name);

  catch(exception: ResearchError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = FAILURE_STATUS[exception.kind];

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.kind}: ${exception.message}`);
    } else {
      this.logger.warn(`${exception.kind}: ${exception.message}`);
    }

    const body: ResearchErrorBody = { statusCode, kind: exception.kind, message: exception.message };
    response.status(statusCode).json(body);
  }
}
