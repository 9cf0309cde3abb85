import { format, Logform } from 'winston';
import { CONTEXT_FIELD, LogRecord, contextOf } from '@logging/domain';
import { ContextStore } from '@logging/service';

const MERGED = Symbol('contextMerged');

/**
 * Fold the ambient request context into `record`, once. Context attached at
 * the call site wins over ambient entries of the same key.
 */
export function mergeContext<T extends LogRecord>(record: T, store: ContextStore): T {
  const info: LogRecord = record;
  if (info[MERGED] !== true) {
    info[CONTEXT_FIELD] = store.merge(contextOf(info), store.snapshot());
    info[MERGED] = true;
  }
  return record;
}

/**
 * contextMerge - runs mergeContext for every record in the logger-level
 * pipeline, i.e. inside the `logger.log()` call that produced it. Records
 * are never dropped.
 *
 * Under backpressure winston queues records and formats them later, outside
 * the caller's async context; WinstonLogger therefore merges before handing
 * the record over, and this format leaves such records alone. For Nest
 * `Logger` output this format is only the fallback: it does the merge for
 * records written to the winston logger directly, or through a WinstonLogger
 * built without a store.
 */
export function contextMerge(store: ContextStore): Logform.Format {
  return format((info) => mergeContext(info, store))();
}
