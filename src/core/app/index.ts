export * from './ports/logger';
export * from './ports/teamRepository';
export * from './ports/carRepository';
export * from './ports/raceEventRepository';
export * from './ports/raceEntryRepository';
export * from './ports/raceResultRepository';
export * from './ports/raceUnitOfWork';
export * from './errors/storageError';
export * from './errors/noEligibleParticipantsError';
export * from './errors/duplicateTeamNameError';
export * from './errors/duplicateCarNameError';
export * from './validation';
export * from './services/race/raceEngine';
export * from './services/race/raceSummary';
export * from './services/roster/teamService';
export * from './services/roster/carService';
