import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '../../src/app.module';
import { SeedService } from '../../src/restaurantes/infrastructure/persistence/seed.service';
import { MetricsService } from '../../src/restaurantes/infrastructure/metrics/metrics.service';

describe('Rate Limiting (e2e)', () => {
  let app: INestApplication;
  let metricsService: MetricsService;
  const originalEnv = process.env;

  beforeAll(async () => {
    // Production-like limits, kept small for the test
    process.env = {
      ...originalEnv,
      ENABLE_RATE_LIMITING: 'true',
      RATE_LIMIT_PER_MINUTE: '3',
    };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication();
    metricsService = moduleFixture.get<MetricsService>(MetricsService);

    app.setGlobalPrefix('api', {
      exclude: ['/'],
    });

    await app.init();
    await moduleFixture.get<SeedService>(SeedService).seed();
  });

  afterAll(async () => {
    await app.close();
    process.env = originalEnv;
  });

  it('should return 429 once the limit per minute is exceeded', async () => {
    const server = app.getHttpServer();

    for (let i = 0; i < 3; i++) {
      await request(server).get('/api/restaurantes/Madrid').expect(200);
    }

    const response = await request(server)
      .get('/api/restaurantes/Madrid')
      .expect(429);

    expect(response.body).toEqual({
      error: 'rate_limited',
      detail: 'Too many requests',
    });
    expect(metricsService.getMetrics().rateLimited).toBe(1);
  });
});
