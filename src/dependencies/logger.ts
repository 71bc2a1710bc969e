import type { Logger, LoggerContext } from '@core/app';
import { createPinoLogger } from '@core/infra';

import type { EngineEnvironment } from '@/server/config/environment';

export const createApplicationLogger = (environment: EngineEnvironment): Logger =>
  createPinoLogger({
    level: environment.logging.level,
    logDirectory: environment.logging.directory,
    fileNamePrefix: environment.logging.fileNamePrefix,
    disableFileLogs: environment.logging.disableFileLogs,
    disableConsoleLogs: environment.logging.disableConsoleLogs,
  });

export const getComponentLogger = (logger: Logger, component: string, context: LoggerContext = {}) =>
  logger.withContext({ component, ...context });
