/**
 * Filename: tests/infra/sqlite/__fixtures__/sqliteTestDatabase.ts
 * Purpose: In-memory SQLite databases with the rally schema applied.
 */

import {
  SqliteCarRepository,
  SqliteTeamRepository,
  bootstrapSchema,
  openRallyDatabase,
  type RallyDatabaseHandle,
} from '../../../../src/core/infra/sqlite';

export const createTestDatabase = (): RallyDatabaseHandle => {
  const handle = openRallyDatabase(':memory:');
  bootstrapSchema(handle.connection);
  return handle;
};

export type TestCarSpec = {
  name: string;
  speed: number;
  pitStopInterval: number;
  pitStopDuration: number;
};

export const insertTeamWithCars = async (
  handle: RallyDatabaseHandle,
  team: { name: string; budget: number },
  carSpecs: TestCarSpec[] = [],
) => {
  const created = await new SqliteTeamRepository(handle.db).create(team);
  const carRepository = new SqliteCarRepository(handle.db);
  for (const car of carSpecs) {
    await carRepository.create({ ...car, teamId: created.id });
  }
  return created;
};

export const readBudget = (handle: RallyDatabaseHandle, name: string): number | undefined =>
  handle.connection
    .prepare<[string], { budget: number }>('SELECT budget FROM teams WHERE team_name = ?')
    .get(name)?.budget;

export const countRows = (handle: RallyDatabaseHandle, table: string): number =>
  handle.connection.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get()
    ?.total ?? 0;
