import type { Country, CountryResponse } from '@countryfx/types';

const toNumber = (value: string | null) => (value === null ? null : Number(value));

export function toCountryResponse(row: Country): CountryResponse {
  return {
    id: row.id,
    name: row.name,
    capital: row.capital,
    region: row.region,
    population: row.population,
    currency_code: row.currencyCode,
    exchange_rate: toNumber(row.exchangeRate),
    estimated_gdp: toNumber(row.estimatedGdp),
    flag_url: row.flagUrl,
    last_refreshed_at: row.lastRefreshedAt.toISOString(),
  };
}
