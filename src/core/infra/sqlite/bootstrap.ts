import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import type Database from 'better-sqlite3';

import { StorageError } from '@core/app';

import { RALLY_TABLE_NAMES } from './schema';

const SCHEMA_FILE = fileURLToPath(new URL('./schema.sql', import.meta.url));

export const readSchemaSql = (): string => readFileSync(SCHEMA_FILE, 'utf8');

export const countRallyTables = (connection: Database.Database): number => {
  const placeholders = RALLY_TABLE_NAMES.map(() => '?').join(', ');
  const row = connection
    .prepare<string[], { total: number }>(
      `SELECT COUNT(*) AS total FROM sqlite_master WHERE type = 'table' AND name IN (${placeholders})`,
    )
    .get(...RALLY_TABLE_NAMES);

  return row?.total ?? 0;
};

export const isSchemaSetupNeeded = (connection: Database.Database): boolean =>
  countRallyTables(connection) < RALLY_TABLE_NAMES.length;

/** Creates every rally table that does not exist yet. */
export const bootstrapSchema = (connection: Database.Database): void => {
  try {
    connection.exec(readSchemaSql());
  } catch (error) {
    throw new StorageError('schema.bootstrap', error);
  }
};
