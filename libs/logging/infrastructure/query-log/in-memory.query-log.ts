import { QueryRecord } from '@logging/domain';
import { QueryLogPort } from '@logging/out-ports';

/**
 * InMemoryQueryLog - keeps the most recent `capacity` statements.
 *
 * `count()` keeps growing after old entries are evicted, so a count sampled
 * earlier stays a valid argument to `since()`.
 */
export class InMemoryQueryLog extends QueryLogPort {
  private readonly entries: QueryRecord[] = [];
  private total = 0;

  constructor(private readonly capacity = 1000) {
    super();
  }

  record(query: QueryRecord): void {
    this.entries.push(query);
    this.total += 1;
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  count(): number {
    return this.total;
  }

  since(count: number): QueryRecord[] {
    const evicted = this.total - this.entries.length;
    return this.entries.slice(Math.max(count - evicted, 0));
  }
}
