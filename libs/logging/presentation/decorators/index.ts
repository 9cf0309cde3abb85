export { NoLog, NO_LOG_KEY } from './no-log.decorator';
export {
  ExecutionLogLevel,
  QueryLogRegistry,
  TrackExecution,
  TrackExecutionOptions,
} from './track-execution.decorator';
