export type CountryStoreKind = 'postgres' | 'memory';

export type ApiRuntimeEnv = {
  nodeEnv: string;
  host: string;
  port: number;
  store: CountryStoreKind;
  countriesApiUrl: string;
  exchangeRatesApiUrl: string;
  sourceTimeoutMs: number;
  reportPath: string;
  reportFontPath: string | null;
  refreshConcurrency: number;
  gdpRandomSeed: number | null;
  webOrigin: string | null;
  rateLimitMax: number;
  rateLimitWindow: string;
};

type EnvSource = Record<string, string | undefined>;

export const DEFAULT_COUNTRIES_API_URL =
  'https://restcountries.com/v2/all?fields=name,capital,region,population,flag,currencies';
export const DEFAULT_EXCHANGE_RATES_API_URL = 'https://open.er-api.com/v6/latest/USD';
export const DEFAULT_REPORT_PATH = 'cache/summary.png';

function read(source: EnvSource, name: string): string {
  return (source[name] ?? '').trim();
}

function parsePort(source: EnvSource, name: string, fallback: number): number {
  const raw = read(source, name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    throw new Error(`Invalid ${name}: expected integer port (1-65535), got "${raw}"`);
  }
  return parsed;
}

function parsePositiveInt(source: EnvSource, name: string, fallback: number): number {
  const raw = read(source, name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: expected positive integer, got "${raw}"`);
  }
  return parsed;
}

function parseUrl(source: EnvSource, name: string, fallback: string): string {
  const raw = read(source, name) || fallback;
  try {
    return new URL(raw).toString();
  } catch {
    throw new Error(`Invalid ${name}: expected absolute URL, got "${raw}"`);
  }
}

function parseStore(source: EnvSource): CountryStoreKind {
  const raw = read(source, 'COUNTRY_STORE').toLowerCase() || 'postgres';
  if (raw !== 'postgres' && raw !== 'memory') {
    throw new Error(`Invalid COUNTRY_STORE: expected "postgres" or "memory", got "${raw}"`);
  }
  return raw;
}

function parseSeed(source: EnvSource): number | null {
  const raw = read(source, 'GDP_RANDOM_SEED');
  if (!raw) return null;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid GDP_RANDOM_SEED: expected integer, got "${raw}"`);
  }
  return parsed;
}

export function validateApiRuntimeEnv(source: EnvSource = process.env): ApiRuntimeEnv {
  const nodeEnv = read(source, 'NODE_ENV') || 'development';
  const store = parseStore(source);
  // the pool in @countryfx/db reads DATABASE_URL itself; only its presence is checked here
  const databaseUrl = read(source, 'DATABASE_URL');

  const missing: string[] = [];
  if (store === 'postgres' && !databaseUrl) missing.push('DATABASE_URL');
  if (missing.length > 0) {
    throw new Error(`Missing required API env vars: ${missing.join(', ')}`);
  }

  return {
    nodeEnv,
    host: read(source, 'HOST') || '0.0.0.0',
    port: parsePort(source, 'PORT', 8000),
    store,
    countriesApiUrl: parseUrl(source, 'COUNTRIES_API_URL', DEFAULT_COUNTRIES_API_URL),
    exchangeRatesApiUrl: parseUrl(source, 'EXCHANGE_RATES_API_URL', DEFAULT_EXCHANGE_RATES_API_URL),
    sourceTimeoutMs: parsePositiveInt(source, 'SOURCE_TIMEOUT_MS', 30_000),
    reportPath: read(source, 'REPORT_PATH') || DEFAULT_REPORT_PATH,
    reportFontPath: read(source, 'REPORT_FONT_PATH') || null,
    refreshConcurrency: parsePositiveInt(source, 'REFRESH_CONCURRENCY', 2),
    gdpRandomSeed: parseSeed(source),
    webOrigin: read(source, 'WEB_ORIGIN') || null,
    rateLimitMax: parsePositiveInt(source, 'RATE_LIMIT_MAX', 600),
    rateLimitWindow: read(source, 'RATE_LIMIT_WINDOW') || '1 minute',
  };
}
