import type { CarRepository } from './carRepository';
import type { RaceEntryRepository } from './raceEntryRepository';
import type { RaceEventRepository } from './raceEventRepository';
import type { RaceResultRepository } from './raceResultRepository';
import type { TeamRepository } from './teamRepository';

export type RacePersistencePorts = {
  teams: TeamRepository;
  cars: CarRepository;
  raceEvents: RaceEventRepository;
  raceEntries: RaceEntryRepository;
  raceResults: RaceResultRepository;
};

/**
 * Runs `work` inside one transaction. Every write made through the supplied
 * ports is committed when `work` resolves and discarded when it throws; the
 * error is rethrown. Invocations do not interleave.
 */
export interface RaceUnitOfWork {
  run<T>(work: (ports: RacePersistencePorts) => Promise<T>): Promise<T>;
}
