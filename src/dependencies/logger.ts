import type { Logger } from '@core/app';
import { createPinoLogger } from '@core/infra';

import { getEnvironment, type EnvironmentConfig } from '@/server/config/environment';

export const createApplicationLogger = (logging: EnvironmentConfig['logging']): Logger =>
  createPinoLogger({
    level: logging.level,
    logDirectory: logging.directory,
    disableFileLogs: logging.disableFileLogs,
  });

let applicationLogger: Logger | null = null;

export const getApplicationLogger = (): Logger => {
  if (!applicationLogger) {
    applicationLogger = createApplicationLogger(getEnvironment().logging);
  }

  return applicationLogger;
};
