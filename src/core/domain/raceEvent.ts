export type RaceEvent = {
  id: number;
  distance: number;
  startedAt: Date;
};

export type CreateRaceEventInput = {
  distance: number;
  startedAt: Date;
};
