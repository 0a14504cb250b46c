import type { EnrichedCountry, RateTable, RawCountryRecord } from '@countryfx/types';
import { defaultRandom, type RandomSource } from '../../../lib/random.js';
import { toNameKey } from '../identity.js';

export const GDP_MULTIPLIER_MIN = 1000;
export const GDP_MULTIPLIER_MAX = 2000;

// numeric(30,2) and numeric(20,8) hold fewer than 28 and 12 integer digits
export const MAX_STORABLE_GDP = 1e28;
export const MAX_STORABLE_RATE = 1e12;

/** GDP stored for countries without a usable currency code. */
export const ZERO_GDP = '0.00';

export type EnrichOptions = {
  refreshedAt: Date;
  random?: RandomSource;
};

/**
 * population × m / rate with m drawn from [1000, 2000). Null when the rate
 * is zero or the result does not fit the GDP column. Each call draws a fresh
 * multiplier.
 */
export function estimateGdp(
  population: number,
  rate: number,
  random: RandomSource = defaultRandom
): number | null {
  if (rate === 0) return null;
  const multiplier = GDP_MULTIPLIER_MIN + random() * (GDP_MULTIPLIER_MAX - GDP_MULTIPLIER_MIN);
  const gdp = (population * multiplier) / rate;
  return Number.isFinite(gdp) && gdp < MAX_STORABLE_GDP ? gdp : null;
}

export function formatRate(rate: number): string {
  return rate.toFixed(8);
}

export function formatGdpDecimal(gdp: number): string {
  const fixed = gdp.toFixed(2);
  // toFixed switches to exponent notation from 1e21 upwards
  return fixed.includes('e') ? `${BigInt(Math.round(gdp)).toString()}.00` : fixed;
}

function firstCurrencyCode(raw: RawCountryRecord): string | null {
  const code = raw.currencies[0]?.code?.trim();
  return code ? code : null;
}

export function enrichCountry(
  raw: RawCountryRecord,
  rates: RateTable,
  { refreshedAt, random = defaultRandom }: EnrichOptions
): EnrichedCountry {
  const base = {
    name: raw.name,
    nameKey: toNameKey(raw.name),
    capital: raw.capital ?? null,
    region: raw.region ?? null,
    population: raw.population,
    flagUrl: raw.flag ?? null,
    lastRefreshedAt: refreshedAt,
  };

  const currencyCode = firstCurrencyCode(raw);
  if (currencyCode === null) {
    return { ...base, currencyCode: null, exchangeRate: null, estimatedGdp: ZERO_GDP };
  }

  // own keys only; a code such as "constructor" must not reach Object.prototype
  const rate = Object.hasOwn(rates, currencyCode) ? rates[currencyCode] : undefined;
  if (rate === undefined || !(rate < MAX_STORABLE_RATE)) {
    return { ...base, currencyCode, exchangeRate: null, estimatedGdp: null };
  }

  const gdp = estimateGdp(raw.population, rate, random);
  return {
    ...base,
    currencyCode,
    exchangeRate: formatRate(rate),
    estimatedGdp: gdp === null ? null : formatGdpDecimal(gdp),
  };
}

export function enrichAll(
  records: RawCountryRecord[],
  rates: RateTable,
  opts: EnrichOptions
): EnrichedCountry[] {
  return records.map((raw) => enrichCountry(raw, rates, opts));
}
