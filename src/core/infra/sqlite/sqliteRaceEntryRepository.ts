import type { RaceEntryRepository } from '@core/app';
import type { RaceEntry } from '@core/domain';

import type { RallyDatabase } from './database';
import { raceEntries } from './schema';
import { withStorageErrors } from './storageErrors';

export class SqliteRaceEntryRepository implements RaceEntryRepository {
  constructor(private readonly db: RallyDatabase) {}

  async bulkInsert(entries: readonly RaceEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    await withStorageErrors('raceEntries.bulkInsert', () =>
      this.db
        .insert(raceEntries)
        .values(
          entries.map((entry) => ({
            raceId: entry.raceId,
            teamId: entry.teamId,
            carId: entry.carId,
            timeTaken: entry.timeTaken,
            fee: entry.feePaid,
          })),
        )
        .run(),
    );
  }

}
