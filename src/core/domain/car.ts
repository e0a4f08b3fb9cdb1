export type Car = {
  id: number;
  name: string;
  /** Distance units per hour. */
  speed: number;
  /** Distance covered between two pit stops. */
  pitStopInterval: number;
  /** Seconds lost per pit stop. */
  pitStopDuration: number;
  teamId: number;
};

export type CarWithTeam = Car & {
  teamName: string;
};

export type CreateCarInput = {
  name: string;
  speed: number;
  pitStopInterval: number;
  pitStopDuration: number;
  teamId: number;
};

/**
 * Roster row read at the instant of the eligibility check. The budget is the
 * team's balance before any fee for the current race has been taken.
 */
export type EligibleCar = {
  carId: number;
  carName: string;
  speed: number;
  pitStopInterval: number;
  pitStopDuration: number;
  teamId: number;
  teamName: string;
  teamBudget: number;
};
