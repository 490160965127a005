import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino from 'pino';
import { AllConfigType } from '../../../config/config.type';

@Injectable()
export class LoggerService {
  private logger: pino.Logger;

  constructor(configService: ConfigService<AllConfigType>) {
    const nodeEnv = configService.getOrThrow('app.nodeEnv', { infer: true });

    this.logger = pino({
      level: configService.getOrThrow('app.logLevel', { infer: true }),
      transport:
        nodeEnv === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
              },
            }
          : undefined,
    });
  }

  log(context: {
    requestId?: string;
    city?: string;
    op: string;
    durationMs?: number;
    outcome: string;
    [key: string]: unknown;
  }): void {
    this.logger.info(context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error({ err: error, ...context }, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context, message);
  }
}
