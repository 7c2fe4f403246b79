import { z } from 'zod';
import { seoSchema } from '../seo/seo.dto';
import { booleanParam, limitParam, queryParam } from '../../lib/utils/validation';
import { DEFAULT_LIST_LIMIT } from '../../config/constants';

export const PROPERTY_TYPES = ['residential', 'commercial', 'land', 'mixed'] as const;
export const PROPERTY_STATUSES = ['pre-sale', 'available', 'sold'] as const;
export const CURRENCIES = ['MXN', 'USD'] as const;

export type PropertyType = typeof PROPERTY_TYPES[number];
export type PropertyStatus = typeof PROPERTY_STATUSES[number];

const url = z.string().url();
const nonNegative = z.number().nonnegative();
const nonNegativeInt = z.number().int().nonnegative();

export const propertySchema = z.object({
  title: z.string(),
  slug: z.string().min(1),
  type: z.enum(PROPERTY_TYPES).default('residential'),
  status: z.enum(PROPERTY_STATUSES).default('available'),
  price: nonNegative,
  currency: z.enum(CURRENCIES).default('USD'),
  location: z.string(),
  address: z.string().nullish(),
  city: z.string().nullish(),
  state: z.string().nullish(),
  country: z.string().nullish().default('Mexico'),
  bedrooms: nonNegativeInt.nullish(),
  bathrooms: nonNegative.nullish(),
  area_m2: nonNegative.nullish(),
  parking: nonNegativeInt.nullish(),
  amenities: z.array(z.string()).default([]),
  description: z.string().nullish(),

  hero_image: url.nullish(),
  gallery: z.array(url).default([]),
  video_url: url.nullish(),
  tour_360_url: url.nullish(),
  floorplan_url: url.nullish(),

  latitude: z.number().nullish(),
  longitude: z.number().nullish(),

  featured: z.boolean().default(false),
  seo: seoSchema.nullish(),
});

export type PropertyInput = z.infer<typeof propertySchema>;

export const propertyStatusUpdateSchema = z.object({
  status: z.enum(PROPERTY_STATUSES),
});

/** Query string of GET /api/properties, mapped onto the filter builder fields. */
export const propertyListQuerySchema = z
  .object({
    location: queryParam(z.string().optional()),
    type: queryParam(z.enum(PROPERTY_TYPES).optional()),
    status: queryParam(z.enum(PROPERTY_STATUSES).optional()),
    price_min: queryParam(z.coerce.number().optional()),
    price_max: queryParam(z.coerce.number().optional()),
    bedrooms: queryParam(z.coerce.number().int().optional()),
    bathrooms: queryParam(z.coerce.number().optional()),
    featured: queryParam(booleanParam.optional()),
    limit: limitParam(DEFAULT_LIST_LIMIT),
  })
  .transform(({ price_min, price_max, limit, ...rest }) => ({
    search: { ...rest, minPrice: price_min, maxPrice: price_max },
    limit,
  }));

export type PropertyListQuery = z.infer<typeof propertyListQuerySchema>;

export interface CreatedResponse {
  id: string;
}

export interface UpdatedResponse {
  updated: true;
}
