import {
  Controller,
  Get,
  Param,
  Query,
  HttpException,
  BadRequestException,
  NotFoundException,
  InternalServerErrorException,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiParam,
  ApiQuery,
  ApiResponse,
} from '@nestjs/swagger';
import { randomUUID } from 'crypto';
import { ZodError } from 'zod';
import { RestaurantQueryService } from '../../application/services/restaurant-query.service';
import {
  FindRestaurantsQuerySchema,
  FindRestaurantsResponse,
} from '../../application/dto/find-restaurants.dto';
import { LookupOutcome } from '../../domain/types/lookup-outcome.type';
import { LoggerService } from '../logging/logger.service';
import { MetricsService } from '../metrics/metrics.service';
import {
  ERROR_RESPONSE_SCHEMA,
  RESTAURANTES_RESPONSE_SCHEMA,
} from './restaurantes.openapi';

@ApiTags('restaurantes')
@Controller('restaurantes')
export class RestaurantesController {
  constructor(
    private readonly restaurantQueryService: RestaurantQueryService,
    private readonly logger: LoggerService,
    private readonly metricsService: MetricsService,
  ) {}

  @Get(':city')
  @ApiOperation({ summary: 'Obtener restaurantes en una ciudad' })
  @ApiParam({
    name: 'city',
    required: true,
    type: String,
    description: 'Nombre de la ciudad',
  })
  @ApiQuery({ name: 'price_range', required: false, example: '$,$$' })
  @ApiQuery({ name: 'cocina', required: false, example: 'tapas,marisco' })
  @ApiQuery({ name: 'diet', required: false, example: 'vegetariano' })
  @ApiQuery({ name: 'dish', required: false, example: 'paella,croquetas' })
  @ApiQuery({ name: 'coordenadas', required: false, example: '40.4168,-3.7038' })
  @ApiQuery({ name: 'limit', required: false, type: Number })
  @ApiResponse({
    status: 200,
    description: 'Lista de restaurantes',
    schema: RESTAURANTES_RESPONSE_SCHEMA,
  })
  @ApiResponse({
    status: 400,
    description: 'Parámetros inválidos',
    schema: ERROR_RESPONSE_SCHEMA,
  })
  @ApiResponse({
    status: 404,
    description: 'No se encontraron restaurantes',
    schema: ERROR_RESPONSE_SCHEMA,
  })
  async findByCity(
    @Param('city') city: string,
    @Query() query: Record<string, unknown>,
  ): Promise<FindRestaurantsResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const finish = (outcome: LookupOutcome) => {
      this.metricsService.recordLookup(outcome);
      this.metricsService.recordLookupTime(Date.now() - startTime);
    };

    try {
      // Validate path and query together
      const validated = FindRestaurantsQuerySchema.parse({ ...query, city });

      const result =
        await this.restaurantQueryService.findByCity(validated);

      finish('found');
      this.logger.log({
        requestId,
        city: validated.city,
        op: 'find_restaurants',
        results: result.resultados.length,
        durationMs: Date.now() - startTime,
        outcome: 'found',
      });

      return result;
    } catch (error: unknown) {
      if (error instanceof NotFoundException) {
        finish('not_found');
        this.logger.log({
          requestId,
          city,
          op: 'find_restaurants',
          durationMs: Date.now() - startTime,
          outcome: 'not_found',
        });
        throw error;
      }

      const context = {
        requestId,
        city,
        op: 'find_restaurants',
        durationMs: Date.now() - startTime,
      };

      if (error instanceof ZodError) {
        finish('invalid_input');
        this.logger.warn('Find restaurants rejected', {
          ...context,
          outcome: 'invalid_input',
        });
        throw new BadRequestException({
          error: 'invalid_input',
          detail: error.errors,
        });
      }

      if (error instanceof HttpException) {
        const outcome = error.getStatus() < 500 ? 'invalid_input' : 'error';
        finish(outcome);
        this.logger.warn('Find restaurants rejected', { ...context, outcome });
        throw error;
      }

      finish('error');
      this.logger.error(
        'Find restaurants failed',
        error instanceof Error ? error : undefined,
        { ...context, outcome: 'error' },
      );
      throw new InternalServerErrorException({
        error: 'internal_error',
        detail: 'Error al obtener restaurantes de la ciudad',
      });
    }
  }
}
