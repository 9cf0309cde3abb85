/**
 * A single value held by the ContextStore.
 *
 * A tombstoned entry reads as absent, but unlike a key that was never bound
 * it still shadows whatever an outer frame held for the same key.
 */
export interface ContextEntry {
  readonly key: string;
  readonly value: unknown;
  readonly tombstoned: boolean;
}

export type ContextEntries = ReadonlyMap<string, ContextEntry>;

/** Plain key/value view of the visible (non-tombstoned) entries. */
export type ContextSnapshot = Record<string, unknown>;

export function liveEntry(key: string, value: unknown): ContextEntry {
  return { key, value, tombstoned: false };
}

export function tombstone(key: string): ContextEntry {
  return { key, value: undefined, tombstoned: true };
}

/**
 * ContextFrame - the per-execution holder of context entries.
 *
 * The map itself is never mutated: every bind/unbind swaps in a new map, so a
 * child frame forked from this one keeps the entries it was created with.
 */
export class ContextFrame {
  private static nextId = 1;

  readonly id: number;
  private current: ContextEntries;
  private sequence = 0;

  constructor(entries: ContextEntries = new Map()) {
    this.id = ContextFrame.nextId++;
    this.current = entries;
  }

  get entries(): ContextEntries {
    return this.current;
  }

  replace(entries: ContextEntries): void {
    this.current = entries;
  }

  /** Monotonic counter used to stamp restore tokens issued by this frame. */
  nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  fork(): ContextFrame {
    return new ContextFrame(this.current);
  }
}

/**
 * RestoreToken - opaque handle returned by a bind, able to put exactly one
 * key back to the entry it had before (including "was never bound").
 */
export class RestoreToken {
  private used = false;

  constructor(
    readonly key: string,
    readonly previous: ContextEntry | undefined,
    readonly frameId: number,
    readonly sequence: number,
  ) {}

  get consumed(): boolean {
    return this.used;
  }

  consume(): void {
    this.used = true;
  }
}

export type RestoreTokens = Record<string, RestoreToken>;
