import { QueryRecord } from '@logging/domain';

/**
 * QueryLogPort - read side of the running database query counter.
 *
 * The counter only ever grows. Request logging samples `count()` when a
 * request starts and asks for `since(sample)` when it finishes; it never
 * writes to the log.
 */
export abstract class QueryLogPort {
  /** Total number of statements recorded so far. */
  abstract count(): number;

  /**
   * Statements recorded after the given count, oldest first. Entries that
   * have already been evicted are skipped.
   */
  abstract since(count: number): QueryRecord[];
}
