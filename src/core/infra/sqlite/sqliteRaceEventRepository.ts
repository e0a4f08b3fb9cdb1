import { desc, eq } from 'drizzle-orm';

import type { RaceEventRepository } from '@core/app';
import type { CreateRaceEventInput, RaceEvent } from '@core/domain';

import type { RallyDatabase } from './database';
import { raceEvents } from './schema';
import { withStorageErrors } from './storageErrors';

type RaceEventRow = typeof raceEvents.$inferSelect;

const toDomain = (row: RaceEventRow): RaceEvent => ({
  id: row.id,
  distance: row.distance,
  startedAt: new Date(row.startedAt),
});

export class SqliteRaceEventRepository implements RaceEventRepository {
  constructor(private readonly db: RallyDatabase) {}

  async create(input: CreateRaceEventInput): Promise<RaceEvent> {
    const row = await withStorageErrors('raceEvents.create', () =>
      this.db
        .insert(raceEvents)
        .values({ distance: input.distance, startedAt: input.startedAt.toISOString() })
        .returning()
        .get(),
    );

    return toDomain(row);
  }

  async getById(id: number): Promise<RaceEvent | null> {
    const row = await withStorageErrors('raceEvents.getById', () =>
      this.db.select().from(raceEvents).where(eq(raceEvents.id, id)).get(),
    );

    return row ? toDomain(row) : null;
  }

  async list(): Promise<RaceEvent[]> {
    const rows = await withStorageErrors('raceEvents.list', () =>
      this.db.select().from(raceEvents).orderBy(desc(raceEvents.id)).all(),
    );

    return rows.map(toDomain);
  }
}
