export type RaceEntry = {
  raceId: number;
  teamId: number;
  carId: number;
  /** Seconds. */
  timeTaken: number;
  feePaid: number;
};
