export * from './database';
export * from './schema';
export * from './bootstrap';
export * from './storageErrors';
export * from './sqliteTeamRepository';
export * from './sqliteCarRepository';
export * from './sqliteRaceEventRepository';
export * from './sqliteRaceEntryRepository';
export * from './sqliteRaceResultRepository';
export * from './sqliteRaceUnitOfWork';
