import { LoggerService, LogLevel } from '@nestjs/common';
import type { LogEntry, Logger } from 'winston';
import { SPLAT } from 'triple-beam';
import {
  CONTEXT_FIELD,
  ContextSnapshot,
  isContextSnapshot,
  LogRecord,
  messageText,
} from '@logging/domain';
import { ContextStore } from '@logging/service';
import { mergeContext } from './context-merge.format';

type WinstonLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const NEST_TO_WINSTON: Record<LogLevel, WinstonLevel> = {
  fatal: 'error',
  error: 'error',
  warn: 'warn',
  log: 'info',
  verbose: 'verbose',
  debug: 'debug',
};

const INTERPOLATION = /%[sdifjoO%]/;

/**
 * WinstonLogger - Nest LoggerService that writes through winston.
 *
 * Nest calls arrive as `(message, ...params, loggerName)`; `error` may carry
 * a stack as its first param. An object param with a `context` key supplies
 * the record's explicit context, other object params are copied onto the
 * record, and the remaining values fill `%s`-style placeholders.
 *
 * Install with `app.useLogger(app.get(WinstonLogger))`.
 */
export class WinstonLogger implements LoggerService {
  private enabled?: ReadonlySet<LogLevel>;

  /**
   * @param store when given, records are merged with the request context
   * at the call site rather than when winston formats them
   */
  constructor(
    readonly backend: Logger,
    private readonly store?: ContextStore,
  ) {}

  log(message: unknown, ...params: unknown[]): void {
    this.write('log', message, params);
  }

  error(message: unknown, ...params: unknown[]): void {
    this.write('error', message, params);
  }

  warn(message: unknown, ...params: unknown[]): void {
    this.write('warn', message, params);
  }

  debug(message: unknown, ...params: unknown[]): void {
    this.write('debug', message, params);
  }

  verbose(message: unknown, ...params: unknown[]): void {
    this.write('verbose', message, params);
  }

  fatal(message: unknown, ...params: unknown[]): void {
    this.write('fatal', message, params);
  }

  setLogLevels(levels: LogLevel[]): void {
    this.enabled = new Set(levels);
  }

  private write(level: LogLevel, message: unknown, params: unknown[]): void {
    if (this.enabled && !this.enabled.has(level)) {
      return;
    }

    const rest = [...params];
    const loggerName =
      typeof rest[rest.length - 1] === 'string' ? String(rest.pop()) : undefined;

    let stack: string | undefined;
    if ((level === 'error' || level === 'fatal') && rest.length > 0) {
      const first = rest[0];
      if (first === undefined || typeof first === 'string') {
        rest.shift();
        stack = first;
      }
    }

    let context: ContextSnapshot | undefined;
    const meta: Record<string, unknown> = {};
    const positional: unknown[] = [];
    for (const param of rest) {
      if (isContextSnapshot(param) && CONTEXT_FIELD in param) {
        const { [CONTEXT_FIELD]: explicit, ...others } = param;
        context = isContextSnapshot(explicit) ? explicit : undefined;
        Object.assign(meta, others);
      } else if (isContextSnapshot(param) && !(param instanceof Error)) {
        Object.assign(meta, param);
      } else {
        positional.push(param);
      }
    }

    if (message instanceof Error) {
      stack ??= message.stack;
    }
    let text = messageText(message);
    const interpolate = INTERPOLATION.test(text) && positional.length > 0;
    if (!interpolate && positional.length > 0) {
      text = [text, ...positional.map(String)].join(' ');
    }

    const record: LogEntry & LogRecord = {
      ...meta,
      level: NEST_TO_WINSTON[level],
      message: text,
      ...(loggerName !== undefined && { logger: loggerName }),
      ...(stack !== undefined && { stack }),
      ...(context !== undefined && { [CONTEXT_FIELD]: context }),
      ...(interpolate && { [SPLAT]: positional }),
    };
    this.backend.log(this.store ? mergeContext(record, this.store) : record);
  }
}
