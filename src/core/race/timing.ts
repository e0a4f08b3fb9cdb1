export const SECONDS_PER_HOUR = 3600;

export type TimingProfile = {
  speed: number;
  pitStopInterval: number;
  pitStopDuration: number;
};

/** Complete pit intervals covered over the distance. */
export const countPitStops = (distance: number, pitStopInterval: number): number =>
  Math.floor(distance / pitStopInterval);

/**
 * Finishing time in seconds: driving time at constant speed plus one pit stop
 * for every complete pit interval covered.
 */
export const computeTimeTaken = (distance: number, profile: TimingProfile): number =>
  (distance / profile.speed) * SECONDS_PER_HOUR +
  countPitStops(distance, profile.pitStopInterval) * profile.pitStopDuration;
