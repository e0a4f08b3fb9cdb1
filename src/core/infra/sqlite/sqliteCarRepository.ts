import { asc, eq, gte } from 'drizzle-orm';

import type { CarRepository } from '@core/app';
import { DuplicateCarNameError } from '@core/app';
import type { Car, CarWithTeam, CreateCarInput, EligibleCar } from '@core/domain';

import type { RallyDatabase } from './database';
import { cars, teams } from './schema';
import { isUniqueConstraintViolation, withStorageErrors } from './storageErrors';

type CarRow = typeof cars.$inferSelect;

const toDomain = (row: CarRow): Car => ({
  id: row.id,
  name: row.name,
  speed: row.speed,
  pitStopInterval: row.pitStopInterval,
  pitStopDuration: row.pitStopDuration,
  teamId: row.teamId,
});

export class SqliteCarRepository implements CarRepository {
  constructor(private readonly db: RallyDatabase) {}

  async findByName(name: string): Promise<Car | null> {
    const row = await withStorageErrors('cars.findByName', () =>
      this.db.select().from(cars).where(eq(cars.name, name)).get(),
    );

    return row ? toDomain(row) : null;
  }

  async list(): Promise<CarWithTeam[]> {
    const rows = await withStorageErrors('cars.list', () =>
      this.db
        .select({ car: cars, teamName: teams.name })
        .from(cars)
        .innerJoin(teams, eq(cars.teamId, teams.id))
        .orderBy(asc(cars.id))
        .all(),
    );

    return rows.map(({ car, teamName }) => ({ ...toDomain(car), teamName }));
  }

  async create(input: CreateCarInput): Promise<Car> {
    const row = await withStorageErrors(
      'cars.create',
      () =>
        this.db
          .insert(cars)
          .values({
            name: input.name,
            speed: input.speed,
            pitStopInterval: input.pitStopInterval,
            pitStopDuration: input.pitStopDuration,
            teamId: input.teamId,
          })
          .returning()
          .get(),
      (error) => (isUniqueConstraintViolation(error) ? new DuplicateCarNameError(input.name) : null),
    );

    return toDomain(row);
  }

  async listEligible(feeThreshold: number): Promise<EligibleCar[]> {
    return withStorageErrors('cars.listEligible', () =>
      this.db
        .select({
          carId: cars.id,
          carName: cars.name,
          speed: cars.speed,
          pitStopInterval: cars.pitStopInterval,
          pitStopDuration: cars.pitStopDuration,
          teamId: teams.id,
          teamName: teams.name,
          teamBudget: teams.budget,
        })
        .from(cars)
        .innerJoin(teams, eq(cars.teamId, teams.id))
        .where(gte(teams.budget, feeThreshold))
        .orderBy(asc(cars.id))
        .all(),
    );
  }
}
