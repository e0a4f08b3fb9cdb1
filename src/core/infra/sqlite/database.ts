import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';

import { rallySchema } from './schema';

export type RallyDatabase = BetterSQLite3Database<typeof rallySchema>;

export type RallyDatabaseHandle = {
  db: RallyDatabase;
  connection: Database.Database;
  close: () => void;
};

export class DatabaseUrlError extends Error {
  constructor(url: string) {
    super(`DATABASE_URL must be ":memory:" or start with "file:" (received "${url}").`);
    this.name = 'DatabaseUrlError';
  }
}

const MEMORY_FILENAME = ':memory:';

/** Maps `file:<path>`, `:memory:` and `file::memory:` to a better-sqlite3 filename. */
export const resolveSqliteFilename = (url: string): string => {
  const trimmed = url.trim();
  if (trimmed === MEMORY_FILENAME) {
    return MEMORY_FILENAME;
  }

  if (!trimmed.startsWith('file:')) {
    throw new DatabaseUrlError(url);
  }

  const filename = trimmed.slice('file:'.length).replace(/^\/\/(?=\/)/, '');
  if (filename.length === 0) {
    throw new DatabaseUrlError(url);
  }

  return filename;
};

export const openRallyDatabase = (url: string): RallyDatabaseHandle => {
  const connection = new Database(resolveSqliteFilename(url));
  connection.pragma('foreign_keys = ON');
  if (connection.name !== MEMORY_FILENAME) {
    connection.pragma('journal_mode = WAL');
  }

  const db = drizzle(connection, { schema: rallySchema });

  return {
    db,
    connection,
    close: () => connection.close(),
  };
};
