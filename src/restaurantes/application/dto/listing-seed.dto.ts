import { z } from 'zod';

const ListingSeedSchema = z.object({
  id: z.string().min(1),
  city: z.string().min(1),
  title: z.string().min(1),
  rating: z.number().min(0).max(5),
  priceRange: z.string().min(1),
  mapsUrl: z.string().url(),
  cuisines: z.array(z.string().min(1)).default([]),
  dietary: z.array(z.string().min(1)).default([]),
  reviews: z.string().default(''),
  latitude: z.number().min(-90).max(90).nullable().default(null),
  longitude: z.number().min(-180).max(180).nullable().default(null),
});

export const ListingSeedFileSchema = z.array(ListingSeedSchema);
