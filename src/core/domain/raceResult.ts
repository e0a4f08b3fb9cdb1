export type RaceResult = {
  raceId: number;
  teamId: number;
  carId: number;
  position: number;
  prizeMoney: number;
};

export const PODIUM_MEDALS: Readonly<Record<number, string>> = {
  1: '🥇',
  2: '🥈',
  3: '🥉',
};
