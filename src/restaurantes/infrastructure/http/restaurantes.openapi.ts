import { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';

export const RESTAURANTES_RESPONSE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    resultados: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          titulo: { type: 'string' },
          estrellas: { type: 'number' },
          rango_de_precios: { type: 'string' },
          url_maps: { type: 'string' },
        },
      },
    },
  },
};

export const ERROR_RESPONSE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    detail: {},
  },
};
