import type { RaceEventRepository, RaceResultRepository, RaceStanding } from '@core/app';
import { PODIUM_MEDALS, type RaceEvent } from '@core/domain';

const PODIUM_SIZE = 3;

export type RaceSummaryRow = RaceStanding & {
  label: string;
  timeTakenMinutes: number;
};

export type PodiumPlace = {
  medal: string;
  position: number;
  teamName: string;
  carName: string;
  timeTakenMinutes: number;
};

export type RaceSummary = {
  event: RaceEvent;
  standings: RaceSummaryRow[];
  podium: PodiumPlace[];
  totalPrizeMoney: number;
};

type RaceSummaryDependencies = {
  raceEventRepository: RaceEventRepository;
  raceResultRepository: RaceResultRepository;
};

export class RaceSummaryService {
  constructor(private readonly dependencies: RaceSummaryDependencies) {}

  async getSummary(raceId: number): Promise<RaceSummary | null> {
    const event = await this.dependencies.raceEventRepository.getById(raceId);
    if (!event) {
      return null;
    }

    const standings = (await this.dependencies.raceResultRepository.listStandings(raceId)).map(
      (standing): RaceSummaryRow => ({
        ...standing,
        label: `${standing.teamName} - ${standing.carName}`,
        timeTakenMinutes: standing.timeTaken / 60,
      }),
    );

    // The podium shows the first three rows in finishing order; a tie can put
    // two rows on the same medal.
    const podium = standings.slice(0, PODIUM_SIZE).map(
      (row): PodiumPlace => ({
        medal: PODIUM_MEDALS[row.position] ?? '',
        position: row.position,
        teamName: row.teamName,
        carName: row.carName,
        timeTakenMinutes: row.timeTakenMinutes,
      }),
    );

    return {
      event,
      standings,
      podium,
      totalPrizeMoney: standings.reduce((total, row) => total + row.prizeMoney, 0),
    };
  }

  async listRaces(): Promise<RaceEvent[]> {
    return this.dependencies.raceEventRepository.list();
  }
}
