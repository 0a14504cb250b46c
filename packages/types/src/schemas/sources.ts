import { z } from 'zod/v4';

export const SourceNameSchema = z.enum(['countries', 'exchange_rates']);

export const CurrencyDescriptorSchema = z.object({
  code: z.string().nullish(),
  name: z.string().nullish(),
  symbol: z.string().nullish(),
});

/** One entry of the country directory payload. */
export const RawCountryRecordSchema = z.object({
  name: z.string().min(1),
  capital: z.string().nullish(),
  region: z.string().nullish(),
  population: z.number().int().nonnegative(),
  currencies: z
    .array(CurrencyDescriptorSchema)
    .nullish()
    .transform((list) => list ?? []),
  flag: z.string().nullish(),
  independent: z.boolean().default(false),
});

export const CountriesPayloadSchema = z.array(RawCountryRecordSchema);

export const RateTableSchema = z.record(z.string(), z.number().nonnegative());

export const ExchangeRatesPayloadSchema = z.object({
  rates: RateTableSchema,
});
