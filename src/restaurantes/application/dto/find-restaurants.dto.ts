import { z } from 'zod';
import { GeoPoint } from '../../domain/types/geo.type';
import { splitList } from '../utils/search-key.util';

const CommaSeparatedList = z.string().transform(splitList);

const Coordinates = z
  .string()
  .regex(
    /^\s*-?\d+(\.\d+)?\s*,\s*-?\d+(\.\d+)?\s*$/,
    'Formato de coordenadas inválido',
  )
  .transform((value): GeoPoint => {
    const [lat, lng] = value.split(',').map((part) => Number(part.trim()));
    return { lat, lng };
  })
  .refine(
    (point) => Math.abs(point.lat) <= 90 && Math.abs(point.lng) <= 180,
    'Coordenadas fuera de rango',
  );

export const FindRestaurantsQuerySchema = z.object({
  city: z.string().trim().min(1).max(100),
  price_range: CommaSeparatedList.optional(),
  cocina: CommaSeparatedList.optional(),
  diet: z.string().trim().min(1).max(100).optional(),
  dish: CommaSeparatedList.optional(),
  coordenadas: Coordinates.optional(),
  limit: z.coerce.number().int().min(1).max(50).optional(),
});

export type FindRestaurantsQuery = z.infer<typeof FindRestaurantsQuerySchema>;

// Wire format: exactly these four fields per record
export const RestaurantListingItemSchema = z
  .object({
    titulo: z.string().min(1),
    estrellas: z.number(),
    rango_de_precios: z.string(),
    url_maps: z.string(),
  })
  .strict();

export const FindRestaurantsResponseSchema = z
  .object({
    resultados: z.array(RestaurantListingItemSchema),
  })
  .strict();

export type RestaurantListingItem = z.infer<
  typeof RestaurantListingItemSchema
>;
export type FindRestaurantsResponse = z.infer<
  typeof FindRestaurantsResponseSchema
>;
