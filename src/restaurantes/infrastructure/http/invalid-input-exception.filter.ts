import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import { Response } from 'express';
import { z } from 'zod';
import { LoggerService } from '../logging/logger.service';
import { MetricsService } from '../metrics/metrics.service';

const ErrorBodySchema = z.object({
  error: z.string(),
  detail: z.unknown(),
});

/**
 * Gives 400s raised before a handler runs (e.g. a city segment with
 * malformed percent-encoding) the same body as validation failures.
 */
@Catch(BadRequestException)
export class InvalidInputExceptionFilter implements ExceptionFilter {
  constructor(
    private readonly metricsService: MetricsService,
    private readonly logger: LoggerService,
  ) {}

  catch(exception: BadRequestException, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = exception.getResponse();

    if (ErrorBodySchema.safeParse(body).success) {
      // Thrown by a handler, already counted there
      response.status(HttpStatus.BAD_REQUEST).json(body);
      return;
    }

    this.metricsService.recordLookup('invalid_input');
    this.logger.warn('Find restaurants rejected', {
      op: 'find_restaurants',
      outcome: 'invalid_input',
      detail: exception.message,
    });

    response.status(HttpStatus.BAD_REQUEST).json({
      error: 'invalid_input',
      detail: exception.message,
    });
  }
}
