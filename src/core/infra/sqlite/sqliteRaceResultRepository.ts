import { and, asc, eq } from 'drizzle-orm';

import type { RaceResultRepository, RaceStanding } from '@core/app';
import type { RaceResult } from '@core/domain';

import type { RallyDatabase } from './database';
import { cars, raceEntries, raceResults, teams } from './schema';
import { withStorageErrors } from './storageErrors';

export class SqliteRaceResultRepository implements RaceResultRepository {
  constructor(private readonly db: RallyDatabase) {}

  async bulkInsert(results: readonly RaceResult[]): Promise<void> {
    if (results.length === 0) {
      return;
    }

    await withStorageErrors('raceResults.bulkInsert', () =>
      this.db
        .insert(raceResults)
        .values(results.map((result) => ({ ...result })))
        .run(),
    );
  }

  async listStandings(raceId: number): Promise<RaceStanding[]> {
    return withStorageErrors('raceResults.listStandings', () =>
      this.db
        .select({
          raceId: raceResults.raceId,
          teamId: raceResults.teamId,
          teamName: teams.name,
          carId: raceResults.carId,
          carName: cars.name,
          timeTaken: raceEntries.timeTaken,
          position: raceResults.position,
          prizeMoney: raceResults.prizeMoney,
        })
        .from(raceResults)
        .innerJoin(
          raceEntries,
          and(eq(raceResults.raceId, raceEntries.raceId), eq(raceResults.carId, raceEntries.carId)),
        )
        .innerJoin(teams, eq(raceResults.teamId, teams.id))
        .innerJoin(cars, eq(raceResults.carId, cars.id))
        .where(eq(raceResults.raceId, raceId))
        .orderBy(asc(raceResults.position), asc(raceResults.carId))
        .all(),
    );
  }
}
