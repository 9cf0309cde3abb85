import { registerAs } from '@nestjs/config';
import { Transform, plainToInstance } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  Min,
  ValidationError,
  validateSync,
} from 'class-validator';
import { FormatterKind, QueryLogSource } from '@logging/value-objects';
import { IsFieldTemplate } from './field-template.validator';

export const LOGGING_CONFIG_KEY = 'logging';

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug'] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

const toBoolean = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value;

const toList = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string'
    ? value
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter((item) => item.length > 0)
    : value;

const toInteger = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? Number(value) : value;

/**
 * LoggingSettings - resolved, validated logging configuration.
 *
 * Request logging reads these values as they are; defaults and validation
 * happen here, once, when the configuration is loaded.
 */
export class LoggingSettings {
  @Transform(toBoolean)
  @IsBoolean()
  queryCountingEnabled!: boolean;

  @IsEnum(QueryLogSource)
  queryLogSource!: QueryLogSource;

  @Transform(toInteger)
  @IsInt()
  @Min(1)
  queryLogCapacity!: number;

  @IsString()
  @IsNotEmpty()
  usernameField!: string;

  @IsIn(LOG_LEVELS)
  consoleLevel!: LogLevelName;

  @IsEnum(FormatterKind)
  consoleFormatter!: FormatterKind;

  @IsFieldTemplate()
  consoleFormat!: string;

  @Transform(toList)
  @IsArray()
  @IsIn(LOG_LEVELS, { each: true })
  fileLevels!: LogLevelName[];

  @IsEnum(FormatterKind)
  fileFormatter!: FormatterKind;

  @IsFieldTemplate()
  fileFormat!: string;

  @IsString()
  @IsNotEmpty()
  logDir!: string;

  @IsString()
  @IsNotEmpty()
  dateFormat!: string;

  @IsString()
  @IsNotEmpty()
  mongoUri!: string;
}

export class InvalidLoggingSettingsError extends Error {
  constructor(readonly errors: ValidationError[]) {
    super(
      `Invalid logging settings: ${errors
        .flatMap((error) => Object.values(error.constraints ?? {}))
        .join('; ')}`,
    );
    this.name = 'InvalidLoggingSettingsError';
  }
}

/**
 * Build LoggingSettings from environment variables, applying defaults and
 * rejecting invalid values.
 */
export function loadLoggingSettings(
  env: Record<string, string | undefined> = process.env,
): LoggingSettings {
  const settings = plainToInstance(LoggingSettings, {
    queryCountingEnabled: env.LOG_QUERY_COUNTING_ENABLED ?? 'false',
    queryLogSource: env.LOG_QUERY_SOURCE ?? QueryLogSource.MEMORY,
    queryLogCapacity: env.LOG_QUERY_CAPACITY ?? '1000',
    usernameField: env.LOG_USERNAME_FIELD ?? 'username',
    consoleLevel: env.LOG_CONSOLE_LEVEL ?? 'debug',
    consoleFormatter: env.LOG_CONSOLE_FORMATTER ?? FormatterKind.TEXT,
    consoleFormat: env.LOG_CONSOLE_FORMAT ?? '1',
    fileLevels: env.LOG_FILE_LEVELS ?? '',
    fileFormatter: env.LOG_FILE_FORMATTER ?? FormatterKind.JSON,
    fileFormat: env.LOG_FILE_FORMAT ?? '1',
    logDir: env.LOG_DIR ?? 'logs',
    dateFormat: env.LOG_DATE_FORMAT ?? 'YYYY-MM-DD HH:mm:ss',
    mongoUri: env.MONGODB_URI ?? 'mongodb://localhost:27017/app',
  });

  const errors = validateSync(settings);
  if (errors.length > 0) {
    throw new InvalidLoggingSettingsError(errors);
  }
  return settings;
}

/**
 * Logging configuration namespace, available as `configService.get('logging')`.
 */
export default registerAs(LOGGING_CONFIG_KEY, () => loadLoggingSettings());
