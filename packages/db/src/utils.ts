import { PgTimestampConfig, timestamp } from 'drizzle-orm/pg-core';

export const defaultTimestampOptions: PgTimestampConfig = {
  withTimezone: true,
  mode: 'date',
};

export const createdAtColumn = (columnName = 'created_at') =>
  timestamp(columnName, defaultTimestampOptions).notNull().defaultNow();

export const updatedAtColumn = (columnName = 'updated_at') =>
  timestamp(columnName, defaultTimestampOptions)
    .notNull()
    .defaultNow()
    .$onUpdateFn(() => new Date());

/** Millisecond-precision instant stamped by the writer, e.g. a refresh cycle start. */
export const instantColumn = (columnName: string) =>
  timestamp(columnName, { ...defaultTimestampOptions, precision: 3 }).notNull().defaultNow();
