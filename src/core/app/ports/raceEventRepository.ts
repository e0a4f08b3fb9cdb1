import type { CreateRaceEventInput, RaceEvent } from '@core/domain';

export interface RaceEventRepository {
  /** Returns the event with the identity generated by the insert itself. */
  create(input: CreateRaceEventInput): Promise<RaceEvent>;
  getById(id: number): Promise<RaceEvent | null>;
  /** Newest first. */
  list(): Promise<RaceEvent[]>;
}
