import { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AllConfigType } from './config/config.type';

/**
 * Serves the API docs at /docs (JSON at /docs-json). Call after the global
 * prefix is set so documented paths carry it.
 */
export function setupSwagger(app: INestApplication): void {
  const configService = app.get(ConfigService<AllConfigType>);

  const options = new DocumentBuilder()
    .setTitle('API de Restaurantes')
    .setDescription('Obtener restaurantes en una ciudad')
    .setVersion('1.0.0')
    .addServer(configService.getOrThrow('app.publicUrl', { infer: true }))
    .build();

  const document = SwaggerModule.createDocument(app, options);
  SwaggerModule.setup('docs', app, document);
}
