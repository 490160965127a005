import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import {
  MetricsService,
  RestaurantesMetrics,
} from '../metrics/metrics.service';

@ApiTags('metrics')
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get()
  @ApiOperation({ summary: 'Get metrics' })
  @ApiResponse({ status: 200, description: 'Metrics retrieved' })
  getMetrics(): RestaurantesMetrics {
    return this.metricsService.getMetrics();
  }
}
