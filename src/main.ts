import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';
import { setupSwagger } from './swagger';
import { SeedService } from './restaurantes/infrastructure/persistence/seed.service';
import { LoggerService } from './restaurantes/infrastructure/logging/logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  const configService = app.get(ConfigService<AllConfigType>);
  const logger = app.get(LoggerService);

  app.enableShutdownHooks();
  app.setGlobalPrefix(
    configService.getOrThrow('app.apiPrefix', { infer: true }),
    {
      exclude: ['/'],
    },
  );

  // Swagger documentation
  setupSwagger(app);

  // Seed listings on startup
  try {
    const seedService = app.get(SeedService);
    const inserted = await seedService.seed();
    logger.log({ op: 'seed', outcome: 'success', inserted });
  } catch (error: unknown) {
    logger.error(
      'Failed to seed database',
      error instanceof Error ? error : undefined,
      { op: 'seed', outcome: 'error' },
    );
  }

  const port = configService.getOrThrow('app.port', { infer: true });
  await app.listen(port);
  logger.log({
    op: 'bootstrap',
    outcome: 'success',
    url: `http://localhost:${port}`,
    docs: `http://localhost:${port}/docs`,
  });
}
void bootstrap();
