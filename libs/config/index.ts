export {
  default as loggingConfig,
  InvalidLoggingSettingsError,
  LOGGING_CONFIG_KEY,
  LOG_LEVELS,
  LogLevelName,
  LoggingSettings,
  loadLoggingSettings,
} from './logging.config';
export { IsFieldTemplate } from './field-template.validator';
