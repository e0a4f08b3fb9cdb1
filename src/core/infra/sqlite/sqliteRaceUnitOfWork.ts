import type { Logger, RacePersistencePorts, RaceUnitOfWork } from '@core/app';
import { StorageError } from '@core/app';

import { ensureError } from '@/lib/errors/ensureError';

import type { RallyDatabaseHandle } from './database';
import { SqliteCarRepository } from './sqliteCarRepository';
import { SqliteRaceEntryRepository } from './sqliteRaceEntryRepository';
import { SqliteRaceEventRepository } from './sqliteRaceEventRepository';
import { SqliteRaceResultRepository } from './sqliteRaceResultRepository';
import { SqliteTeamRepository } from './sqliteTeamRepository';

/**
 * One transaction per `run` on the shared connection. Runs are queued so two
 * races never interleave statements; `BEGIN IMMEDIATE` also takes SQLite's
 * write lock before the eligibility read, which keeps other processes from
 * deducting fees against the same budgets in between.
 */
export class SqliteRaceUnitOfWork implements RaceUnitOfWork {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly handle: RallyDatabaseHandle,
    private readonly logger?: Logger,
  ) {}

  run<T>(work: (ports: RacePersistencePorts) => Promise<T>): Promise<T> {
    const result = this.queue.then(() => this.runExclusive(work));
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );

    return result;
  }

  private async runExclusive<T>(work: (ports: RacePersistencePorts) => Promise<T>): Promise<T> {
    const { db, connection } = this.handle;

    try {
      connection.exec('BEGIN IMMEDIATE');
    } catch (error) {
      throw new StorageError('transaction.begin', error);
    }

    let value: T;
    try {
      value = await work({
        teams: new SqliteTeamRepository(db),
        cars: new SqliteCarRepository(db),
        raceEvents: new SqliteRaceEventRepository(db),
        raceEntries: new SqliteRaceEntryRepository(db),
        raceResults: new SqliteRaceResultRepository(db),
      });
    } catch (error) {
      this.rollback(error);
      throw error;
    }

    try {
      connection.exec('COMMIT');
    } catch (error) {
      const commitError = new StorageError('transaction.commit', error);
      this.rollback(commitError);
      throw commitError;
    }

    return value;
  }

  /** The failure that led here is what the caller sees; a failed rollback is only logged. */
  private rollback(reason: unknown) {
    const { connection } = this.handle;
    if (!connection.inTransaction) {
      return;
    }

    try {
      connection.exec('ROLLBACK');
    } catch (error) {
      this.logger?.error('Transaction rollback failed.', {
        event: 'race.transaction.rollback_failed',
        outcome: 'failure',
        error: new StorageError('transaction.rollback', error),
        reason: ensureError(reason).message,
      });
    }
  }
}
