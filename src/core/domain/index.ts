/**
 * Summary: Barrel exports for domain model types used by the application layer.
 */

export * from './team';
export * from './car';
export * from './raceEvent';
export * from './raceEntry';
export * from './raceResult';
