import { z } from 'zod/v4';
import { createInsertSchema } from 'drizzle-zod';
import { countriesTable } from '@countryfx/db';

/** Column constraints of `countries` (varchar lengths, integer ranges) as a zod schema. */
export const CountryInsertSchema = createInsertSchema(countriesTable);

export const CountrySortSchema = z.enum(['gdp_desc', 'gdp_asc']);

export const CountriesListQuerySchema = z.object({
  region: z.string().trim().min(1).optional(),
  currency: z.string().trim().min(1).optional(),
  sort: CountrySortSchema.optional(),
});

export const CountryByNameParamsSchema = z.object({
  name: z.string().trim().min(1),
});

/** Public wire shape: snake_case keys, decimals as JSON numbers. */
export const CountryResponseSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  capital: z.string().nullable(),
  region: z.string().nullable(),
  population: z.number().int().nonnegative(),
  currency_code: z.string().nullable(),
  exchange_rate: z.number().nullable(),
  estimated_gdp: z.number().nullable(),
  flag_url: z.string().nullable(),
  last_refreshed_at: z.string(),
});

export const CountriesListResponseSchema = z.array(CountryResponseSchema);

export const StatusResponseSchema = z.object({
  total_countries: z.number().int().nonnegative(),
  last_refreshed_at: z.string().nullable(),
});

export const RefreshAcceptedResponseSchema = z.object({
  message: z.string(),
});
