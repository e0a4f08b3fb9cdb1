/**
 * Summary: Wiring for the rally services, SQLite repositories and the race unit of work.
 */

import { CarService, RaceEngine, RaceSummaryService, TeamService, type Logger } from '@core/app';
import {
  SqliteCarRepository,
  SqliteRaceEventRepository,
  SqliteRaceResultRepository,
  SqliteRaceUnitOfWork,
  SqliteTeamRepository,
  bootstrapSchema,
  isSchemaSetupNeeded,
  openRallyDatabase,
  type RallyDatabaseHandle,
} from '@core/infra';

import type { EnvironmentConfig } from '@/server/config/environment';

export type RallyContainer = {
  database: RallyDatabaseHandle;
  teamService: TeamService;
  carService: CarService;
  raceEngine: RaceEngine;
  raceSummaryService: RaceSummaryService;
  /** Creates the schema when any rally table is missing; reports whether it ran. */
  ensureSchema: () => boolean;
  close: () => void;
};

export const createRallyContainer = (
  config: Pick<EnvironmentConfig, 'databaseUrl' | 'race'>,
  logger: Logger,
  clock?: () => Date,
): RallyContainer => {
  const database = openRallyDatabase(config.databaseUrl);
  const teamRepository = new SqliteTeamRepository(database.db);
  const carRepository = new SqliteCarRepository(database.db);

  const ensureSchema = () => {
    if (!isSchemaSetupNeeded(database.connection)) {
      return false;
    }

    bootstrapSchema(database.connection);
    logger.info('Rally schema created.', { event: 'schema.bootstrap', outcome: 'success' });
    return true;
  };

  return {
    database,
    teamService: new TeamService(teamRepository, logger),
    carService: new CarService({ carRepository, teamRepository, logger }),
    raceEngine: new RaceEngine({
      unitOfWork: new SqliteRaceUnitOfWork(database, logger),
      logger,
      options: config.race,
      clock,
    }),
    raceSummaryService: new RaceSummaryService({
      raceEventRepository: new SqliteRaceEventRepository(database.db),
      raceResultRepository: new SqliteRaceResultRepository(database.db),
    }),
    ensureSchema,
    close: database.close,
  };
};
