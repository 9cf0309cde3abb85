import { join } from 'path';
import { createLogger, format, Logger, transports } from 'winston';
import type TransportStream from 'winston-transport';
import { LoggingSettings } from '@config';
import { ContextStore } from '@logging/service';
import { createFormatter } from '../formatters';
import { contextMerge } from './context-merge.format';
import { exactLevel } from './level.format';
import { renderWith } from './render.format';

const { combine, errors, splat, timestamp } = format;

/**
 * Build the winston logger behind the Nest logger.
 *
 * Every record goes through errors -> splat -> timestamp -> contextMerge
 * once, then through the format of each transport: the console, and one
 * file per entry of `fileLevels` holding records of exactly that level.
 */
export function createLoggingBackend(
  settings: LoggingSettings,
  store: ContextStore,
  extraTransports: TransportStream[] = [],
): Logger {
  const fileFormatter = createFormatter(settings.fileFormatter, settings.fileFormat);

  const fileTransports = settings.fileLevels.map(
    (level) =>
      new transports.File({
        filename: join(settings.logDir, `${level}.log`),
        level,
        format: combine(exactLevel(level), renderWith(fileFormatter)),
      }),
  );

  return createLogger({
    level: 'debug',
    format: combine(
      errors({ stack: true }),
      splat(),
      timestamp({ format: settings.dateFormat }),
      contextMerge(store),
    ),
    transports: [
      new transports.Console({
        level: settings.consoleLevel,
        format: renderWith(
          createFormatter(settings.consoleFormatter, settings.consoleFormat),
        ),
      }),
      ...fileTransports,
      ...extraTransports,
    ],
  });
}
