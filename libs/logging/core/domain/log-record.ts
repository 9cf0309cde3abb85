import type { Logform } from 'winston';
import type { ContextSnapshot } from './context-entry';

/**
 * LogRecord - the winston `info` object as it moves through the pipeline.
 *
 * Besides `level` and `message` (rendered once `splat()` has interpolated
 * the positional args) a record may carry `logger` (the logger name),
 * `timestamp` (rendered), `stack` (exception text) and `context`. `context`
 * holds whatever the call site attached; after the merge format runs it holds
 * the merged view. Anything else a call site sets is kept as-is.
 */
export type LogRecord = Logform.TransformableInfo;

export const CONTEXT_FIELD = 'context';

export function isContextSnapshot(value: unknown): value is ContextSnapshot {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function contextOf(record: LogRecord): ContextSnapshot {
  const context = record[CONTEXT_FIELD];
  return isContextSnapshot(context) ? context : {};
}

export function stackOf(record: LogRecord): string | undefined {
  return typeof record.stack === 'string' ? record.stack : undefined;
}

/** The message as text, whatever the call site passed. */
export function messageOf(record: LogRecord): string {
  return messageText(record.message);
}

export function messageText(message: unknown): string {
  if (typeof message === 'string') {
    return message;
  }
  if (message instanceof Error) {
    return message.message;
  }
  if (typeof message === 'object' && message !== null) {
    return JSON.stringify(message);
  }
  return String(message);
}
