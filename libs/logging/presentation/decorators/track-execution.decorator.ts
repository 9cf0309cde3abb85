import { Logger } from '@nestjs/common';
import { performance } from 'perf_hooks';
import { QueryLogPort } from '@logging/out-ports';

export type ExecutionLogLevel = 'log' | 'debug' | 'verbose' | 'warn' | 'error';

const EXECUTION_LOG_LEVELS: readonly ExecutionLogLevel[] = [
  'log',
  'debug',
  'verbose',
  'warn',
  'error',
];

export interface TrackExecutionOptions {
  /** Level of the metrics record (default: 'log'). */
  logLevel?: ExecutionLogLevel;
  /** Include the number of database queries the method ran. */
  logQueries?: boolean;
  /** Flag the query count once it goes above this number. */
  queryThreshold?: number;
  /** Also write a separate warning when the threshold is exceeded. */
  queryExceedWarning?: boolean;
}

type ResolvedOptions = Required<Omit<TrackExecutionOptions, 'queryThreshold'>> &
  Pick<TrackExecutionOptions, 'queryThreshold'>;

/**
 * Where @TrackExecution finds the query log. LoggingModule registers it when
 * query counting is enabled; decorated methods are plain class methods and
 * have no access to the Nest container themselves.
 */
export class QueryLogRegistry {
  private static port?: QueryLogPort;

  static register(port: QueryLogPort): void {
    QueryLogRegistry.port = port;
  }

  static clear(): void {
    QueryLogRegistry.port = undefined;
  }

  static current(): QueryLogPort | undefined {
    return QueryLogRegistry.port;
  }
}

function validateOptions(options: TrackExecutionOptions): ResolvedOptions {
  const {
    logLevel = 'log',
    logQueries = false,
    queryThreshold,
    queryExceedWarning = false,
  } = options;

  if (!EXECUTION_LOG_LEVELS.includes(logLevel)) {
    throw new Error(
      `TrackExecution: logLevel must be one of ${EXECUTION_LOG_LEVELS.join(', ')}, got "${logLevel}"`,
    );
  }
  if (typeof logQueries !== 'boolean') {
    throw new Error('TrackExecution: logQueries must be a boolean');
  }
  if (
    queryThreshold !== undefined &&
    (!Number.isInteger(queryThreshold) || queryThreshold < 0)
  ) {
    throw new Error(
      `TrackExecution: queryThreshold must be a non-negative integer, got ${queryThreshold}`,
    );
  }
  if (typeof queryExceedWarning !== 'boolean') {
    throw new Error('TrackExecution: queryExceedWarning must be a boolean');
  }

  return { logLevel, logQueries, queryThreshold, queryExceedWarning };
}

/**
 * Measures one call of a tracked method and writes the metrics record.
 */
class ExecutionTracker {
  private static readonly logger = new Logger('ExecutionTracker');

  private readonly startTime = performance.now();
  private readonly queryLog?: QueryLogPort;
  private readonly startCount: number;

  constructor(
    private readonly name: string,
    private readonly options: ResolvedOptions,
  ) {
    this.queryLog = options.logQueries ? QueryLogRegistry.current() : undefined;
    this.startCount = this.queryLog?.count() ?? 0;
  }

  completed(): void {
    const logger = ExecutionTracker.logger;
    const elapsed = (performance.now() - this.startTime) / 1000;
    const minutes = Math.floor(elapsed / 60);
    const seconds = elapsed - minutes * 60;

    let message =
      `Performance Metrics for Function: '${this.name}'\n` +
      `  Execution Time: ${minutes} minute(s) and ${seconds.toFixed(4)} second(s)`;

    if (this.queryLog) {
      const queries = this.queryLog.count() - this.startCount;
      message += `\n  Database Queries: ${queries} queries `;

      const threshold = this.options.queryThreshold;
      if (threshold !== undefined && queries > threshold) {
        message += `(exceeds threshold of (${threshold}))`;
        if (this.options.queryExceedWarning) {
          logger.warn(
            `Number of database queries (${queries}) exceeded threshold (${threshold}) for function '${this.name}'`,
          );
        }
      }
    } else if (this.options.logQueries) {
      logger.warn(
        'Query counting is disabled, so database queries are not tracked. ' +
          'Set LOG_QUERY_COUNTING_ENABLED=true to include them.',
      );
    }

    this.write(message);
  }

  failed(error: unknown): void {
    const reason = error instanceof Error ? error.message : String(error);
    ExecutionTracker.logger.error(
      `Error executing function '${this.name}': ${reason}`,
      error instanceof Error ? error.stack : undefined,
    );
  }

  private write(message: string): void {
    const logger = ExecutionTracker.logger;
    switch (this.options.logLevel) {
      case 'debug':
        logger.debug(message);
        break;
      case 'verbose':
        logger.verbose(message);
        break;
      case 'warn':
        logger.warn(message);
        break;
      case 'error':
        logger.error(message);
        break;
      default:
        logger.log(message);
    }
  }
}

/**
 * @TrackExecution - logs how long each call of the decorated method took and,
 * optionally, how many database queries it ran.
 *
 * Works for sync and async methods alike. Errors are logged with their stack
 * and re-thrown. Invalid options throw when the class is defined.
 *
 * @example
 * ```typescript
 * @TrackExecution({ logQueries: true, queryThreshold: 5, queryExceedWarning: true })
 * async buildSummary(): Promise<ReportSummary> { ... }
 * ```
 */
export function TrackExecution(options: TrackExecutionOptions = {}) {
  const resolved = validateOptions(options);

  return (
    target: object,
    propertyKey: string | symbol,
    descriptor: PropertyDescriptor,
  ): void => {
    const original: unknown = descriptor.value;
    if (typeof original !== 'function') {
      throw new Error(
        `TrackExecution can only decorate methods, "${String(propertyKey)}" is not one`,
      );
    }

    const owner =
      typeof target === 'function' ? target.name : target.constructor.name;
    const name = `${owner}.${String(propertyKey)}`;

    descriptor.value = function (this: unknown, ...args: unknown[]): unknown {
      const tracker = new ExecutionTracker(name, resolved);

      let result: unknown;
      try {
        result = original.apply(this, args);
      } catch (error) {
        tracker.failed(error);
        throw error;
      }

      if (result instanceof Promise) {
        return result.then(
          (value: unknown) => {
            tracker.completed();
            return value;
          },
          (error: unknown) => {
            tracker.failed(error);
            throw error;
          },
        );
      }

      tracker.completed();
      return result;
    };
  };
}
