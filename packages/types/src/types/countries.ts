import { z } from 'zod/v4';
import { countriesTable } from '@countryfx/db';
import { CountryResponseSchema, CountrySortSchema } from '../schemas/index.js';

export type Country = typeof countriesTable.$inferSelect;

/**
 * A country as produced by one refresh cycle, ready to upsert.
 * Decimal fields are exact strings (numeric(20,8) and numeric(30,2)).
 */
export type EnrichedCountry = {
  name: string;
  nameKey: string;
  capital: string | null;
  region: string | null;
  population: number;
  currencyCode: string | null;
  exchangeRate: string | null;
  estimatedGdp: string | null;
  flagUrl: string | null;
  lastRefreshedAt: Date;
};

export type CountrySort = z.infer<typeof CountrySortSchema>;
export type CountryResponse = z.infer<typeof CountryResponseSchema>;
