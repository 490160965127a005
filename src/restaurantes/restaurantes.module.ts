import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD, APP_FILTER } from '@nestjs/core';
import { AllConfigType } from '../config/config.type';
import { RestaurantListing } from './domain/entities/restaurant-listing.entity';
import { GeoService } from './domain/services/geo.service';
import { RestaurantListingRepository } from './infrastructure/persistence/repositories/restaurant-listing.repository';
import { SeedService } from './infrastructure/persistence/seed.service';
import { ListingCacheService } from './infrastructure/cache/listing-cache.service';
import { LoggerService } from './infrastructure/logging/logger.service';
import { MetricsService } from './infrastructure/metrics/metrics.service';
import { ThrottlerExceptionFilter } from './infrastructure/rate-limiting/throttler-exception.filter';
import { RestaurantQueryService } from './application/services/restaurant-query.service';
import { RestaurantesController } from './infrastructure/http/restaurantes.controller';
import { MetricsController } from './infrastructure/http/metrics.controller';
import { InvalidInputExceptionFilter } from './infrastructure/http/invalid-input-exception.filter';
import { RESTAURANT_LISTING_REPOSITORY } from './tokens';

@Module({
  imports: [
    TypeOrmModule.forFeature([RestaurantListing]),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => ({
        throttlers: [
          {
            ttl: 60000,
            limit: configService.getOrThrow('app.throttleLimit', {
              infer: true,
            }),
          },
        ],
      }),
    }),
  ],
  controllers: [RestaurantesController, MetricsController],
  providers: [
    // Domain services
    GeoService,
    // Infrastructure services
    ListingCacheService,
    LoggerService,
    MetricsService,
    SeedService,
    // Repository interface (token, backed by the TypeORM implementation)
    {
      provide: RESTAURANT_LISTING_REPOSITORY,
      useClass: RestaurantListingRepository,
    },
    // Application services
    RestaurantQueryService,
    // Rate limiting
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: ThrottlerExceptionFilter,
    },
    // Error bodies for 400s raised outside the handlers
    {
      provide: APP_FILTER,
      useClass: InvalidInputExceptionFilter,
    },
  ],
  exports: [SeedService, LoggerService],
})
export class RestaurantesModule {}
