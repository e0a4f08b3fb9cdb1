import type { RaceEntry } from '@core/domain';

export interface RaceEntryRepository {
  bulkInsert(entries: readonly RaceEntry[]): Promise<void>;
}
