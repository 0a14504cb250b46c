import type { EnrichedCountry } from '@countryfx/types';
import { PersistenceError } from '../../../lib/errors.js';
import { rowsUpserted } from '../../../lib/metrics.js';
import type { CountryRepository } from '../repository/index.js';

export const DEFAULT_BATCH_SIZE = 100;

export type PersistResult = {
  /** Store-reported affected rows; not a count of distinct countries. */
  affected: number;
  chunks: number;
  records: number;
};

export type PersistOptions = {
  batchSize?: number;
  onChunk?: (info: { chunkIndex: number; chunkCount: number; affected: number }) => void;
};

/** Collapse records sharing a name key; the last occurrence wins. */
export function dedupeByNameKey(records: EnrichedCountry[]): EnrichedCountry[] {
  const byKey = new Map<string, EnrichedCountry>();
  for (const record of records) {
    byKey.delete(record.nameKey);
    byKey.set(record.nameKey, record);
  }
  return [...byKey.values()];
}

export function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

/**
 * Upserts `records` in sequential chunks. The first failing chunk aborts the
 * rest; chunks already written stay written.
 */
export async function persistCountries(
  records: EnrichedCountry[],
  repository: CountryRepository,
  opts: PersistOptions = {}
): Promise<PersistResult> {
  if (records.length === 0) return { affected: 0, chunks: 0, records: 0 };

  const batchSize = Math.max(1, opts.batchSize ?? DEFAULT_BATCH_SIZE);
  const unique = dedupeByNameKey(records);
  const chunks = chunk(unique, batchSize);

  let affected = 0;
  let persisted = 0;

  for (const [chunkIndex, batch] of chunks.entries()) {
    let chunkAffected: number;
    try {
      chunkAffected = await repository.upsert(batch);
    } catch (err) {
      throw new PersistenceError(
        {
          chunkIndex,
          chunkCount: chunks.length,
          persistedRecords: persisted,
          affectedBeforeFailure: affected,
        },
        { cause: err }
      );
    }

    affected += chunkAffected;
    persisted += batch.length;
    rowsUpserted.inc(chunkAffected);
    opts.onChunk?.({ chunkIndex, chunkCount: chunks.length, affected: chunkAffected });
  }

  return { affected, chunks: chunks.length, records: unique.length };
}
