import {
  CountriesPayloadSchema,
  ExchangeRatesPayloadSchema,
  type RateTable,
  type RawCountryRecord,
  type SourceName,
} from '@countryfx/types';
import type { z } from 'zod/v4';
import { describeError, SourceUnavailableError } from '../../../lib/errors.js';
import { httpRequest } from '../../../lib/http.js';
import { sourceFailures } from '../../../lib/metrics.js';

export interface SourceClient<T> {
  readonly source: SourceName;
  fetch(): Promise<T>;
}

export type SourceClientOptions = {
  timeoutMs?: number;
};

export type RefreshSources = {
  countries: SourceClient<RawCountryRecord[]>;
  exchangeRates: SourceClient<RateTable>;
};

async function fetchJson<S extends z.ZodType>(
  source: SourceName,
  url: string,
  schema: S,
  opts: SourceClientOptions
): Promise<z.output<S>> {
  try {
    let res: { status: number; ok: boolean; text: string };
    try {
      res = await httpRequest(
        url,
        { headers: { accept: 'application/json' }, timeoutMs: opts.timeoutMs ?? 30_000 },
        async (r) => {
          if (!r.ok) {
            await r.body?.cancel();
            return { status: r.status, ok: false, text: '' };
          }
          return { status: r.status, ok: true, text: await r.text() };
        }
      );
    } catch (err) {
      throw new SourceUnavailableError(source, describeError(err), { cause: err });
    }
    if (!res.ok) {
      throw new SourceUnavailableError(source, `HTTP ${res.status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(res.text);
    } catch (err) {
      throw new SourceUnavailableError(source, 'invalid JSON body', { cause: err });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError(source, 'unexpected payload shape', { cause: parsed.error });
    }
    return parsed.data;
  } catch (err) {
    sourceFailures.inc({ source });
    throw err;
  }
}

export function createCountriesSource(
  url: string,
  opts: SourceClientOptions = {}
): SourceClient<RawCountryRecord[]> {
  return {
    source: 'countries',
    fetch: () => fetchJson('countries', url, CountriesPayloadSchema, opts),
  };
}

export function createExchangeRatesSource(
  url: string,
  opts: SourceClientOptions = {}
): SourceClient<RateTable> {
  return {
    source: 'exchange_rates',
    fetch: async () => {
      const payload = await fetchJson('exchange_rates', url, ExchangeRatesPayloadSchema, opts);
      return payload.rates;
    },
  };
}
