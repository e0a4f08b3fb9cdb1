import type { RaceResult } from '@core/domain';

export type RaceStanding = {
  raceId: number;
  teamId: number;
  teamName: string;
  carId: number;
  carName: string;
  timeTaken: number;
  position: number;
  prizeMoney: number;
};

export interface RaceResultRepository {
  bulkInsert(results: readonly RaceResult[]): Promise<void>;
  /** Results joined with their entry, team and car; ordered by position then car id. */
  listStandings(raceId: number): Promise<RaceStanding[]>;
}
