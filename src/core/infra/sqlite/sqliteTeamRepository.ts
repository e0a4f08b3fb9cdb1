import { asc, eq, sql } from 'drizzle-orm';

import type { TeamRepository } from '@core/app';
import { DuplicateTeamNameError, StorageError } from '@core/app';
import type { CreateTeamInput, Team } from '@core/domain';

import type { RallyDatabase } from './database';
import { teams } from './schema';
import { isUniqueConstraintViolation, withStorageErrors } from './storageErrors';

type TeamRow = typeof teams.$inferSelect;

const toDomain = (row: TeamRow): Team => ({
  id: row.id,
  name: row.name,
  budget: row.budget,
});

export class SqliteTeamRepository implements TeamRepository {
  constructor(private readonly db: RallyDatabase) {}

  async getById(id: number): Promise<Team | null> {
    const row = await withStorageErrors('teams.getById', () =>
      this.db.select().from(teams).where(eq(teams.id, id)).get(),
    );

    return row ? toDomain(row) : null;
  }

  async findByName(name: string): Promise<Team | null> {
    const row = await withStorageErrors('teams.findByName', () =>
      this.db.select().from(teams).where(eq(teams.name, name)).get(),
    );

    return row ? toDomain(row) : null;
  }

  async list(): Promise<Team[]> {
    const rows = await withStorageErrors('teams.list', () =>
      this.db.select().from(teams).orderBy(asc(teams.id)).all(),
    );

    return rows.map(toDomain);
  }

  async create(input: CreateTeamInput): Promise<Team> {
    const row = await withStorageErrors(
      'teams.create',
      () => this.db.insert(teams).values({ name: input.name, budget: input.budget }).returning().get(),
      (error) => (isUniqueConstraintViolation(error) ? new DuplicateTeamNameError(input.name) : null),
    );

    return toDomain(row);
  }

  async adjustBudget(teamId: number, delta: number): Promise<void> {
    const result = await withStorageErrors('teams.adjustBudget', () =>
      this.db
        .update(teams)
        .set({ budget: sql`${teams.budget} + ${delta}` })
        .where(eq(teams.id, teamId))
        .run(),
    );

    if (result.changes === 0) {
      throw new StorageError('teams.adjustBudget', new Error(`Team ${teamId} does not exist.`));
    }
  }
}
