import { z } from 'zod/v4';
import { RateTableSchema, RawCountryRecordSchema, SourceNameSchema } from '../schemas/index.js';

export type SourceName = z.infer<typeof SourceNameSchema>;
export type RawCountryRecord = z.infer<typeof RawCountryRecordSchema>;
export type RateTable = z.infer<typeof RateTableSchema>;
