import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import {
  ContextEntries,
  ContextEntry,
  ContextFrame,
  ContextSnapshot,
  ContextTokenError,
  RestoreToken,
  RestoreTokens,
  liveEntry,
  tombstone,
} from '@logging/domain';

/**
 * ContextStore - request-scoped key/value context for log records.
 *
 * Entries live in a ContextFrame held by AsyncLocalStorage. Code running
 * outside any fork sees the root frame. `fork()` and `scoped()` start a child
 * frame holding a copy of the current entries, so concurrent requests (each
 * forked once) never observe each other's bindings, while nested code still
 * inherits what its caller bound.
 */
@Injectable()
export class ContextStore {
  private readonly storage = new AsyncLocalStorage<ContextFrame>();
  private readonly root = new ContextFrame();

  /**
   * Run a function in a child frame of the current one.
   * Bindings made inside never leak back to the caller.
   */
  fork<T>(fn: () => T): T {
    return this.storage.run(this.frame().fork(), fn);
  }

  bind(pairs: ContextSnapshot): void {
    const frame = this.frame();
    const next = new Map(frame.entries);
    for (const [key, value] of Object.entries(pairs)) {
      next.set(key, liveEntry(key, value));
    }
    frame.replace(next);
  }

  batchBind(pairs: ContextSnapshot): RestoreTokens {
    const frame = this.frame();
    const next = new Map(frame.entries);
    const tokens: RestoreTokens = {};

    for (const [key, value] of Object.entries(pairs)) {
      tokens[key] = new RestoreToken(
        key,
        next.get(key),
        frame.id,
        frame.nextSequence(),
      );
      next.set(key, liveEntry(key, value));
    }

    frame.replace(next);
    return tokens;
  }

  unbind(key: string): void {
    const frame = this.frame();
    if (!frame.entries.has(key)) {
      return;
    }
    const next = new Map(frame.entries);
    next.set(key, tombstone(key));
    frame.replace(next);
  }

  /**
   * Put every key back to the entry it had before the bind that issued its
   * token. Later tokens are undone first, so nested bindings of one key
   * unwind in LIFO order.
   */
  reset(tokens: RestoreTokens): void {
    const frame = this.frame();
    const ordered = Object.values(tokens).sort(
      (a, b) => b.sequence - a.sequence,
    );

    for (const token of ordered) {
      if (token.consumed) {
        throw new ContextTokenError(
          `Token for "${token.key}" has already been used`,
        );
      }
      if (token.frameId !== frame.id) {
        throw new ContextTokenError(
          `Token for "${token.key}" was created in a different context`,
        );
      }
    }

    const next = new Map(frame.entries);
    for (const token of ordered) {
      token.consume();
      if (token.previous === undefined) {
        next.delete(token.key);
      } else {
        next.set(token.key, token.previous);
      }
    }
    frame.replace(next);
  }

  clearAll(): void {
    const frame = this.frame();
    const next = new Map<string, ContextEntry>();
    for (const key of frame.entries.keys()) {
      next.set(key, tombstone(key));
    }
    frame.replace(next);
  }

  snapshot(): ContextSnapshot {
    return toSnapshot(this.frame().entries);
  }

  /** `explicit` wins on key collisions. */
  merge(explicit: ContextSnapshot, ambient: ContextSnapshot): ContextSnapshot {
    return { ...ambient, ...explicit };
  }

  /**
   * Bind `pairs` for the duration of `body` only.
   *
   * The body runs in a child frame; its bindings are reset on every exit
   * path, including a thrown error or a rejected promise, and the error is
   * passed on untouched.
   */
  scoped<T>(pairs: ContextSnapshot, body: () => Promise<T>): Promise<T>;
  scoped<T>(pairs: ContextSnapshot, body: () => T): T;
  scoped(pairs: ContextSnapshot, body: () => unknown): unknown {
    return this.fork(() => {
      const tokens = this.batchBind(pairs);
      const restore = (): void => this.reset(tokens);

      let result: unknown;
      try {
        result = body();
      } catch (error) {
        restore();
        throw error;
      }

      if (isPromiseLike(result)) {
        return Promise.resolve(result).finally(restore);
      }
      restore();
      return result;
    });
  }

  private frame(): ContextFrame {
    return this.storage.getStore() ?? this.root;
  }
}

function toSnapshot(entries: ContextEntries): ContextSnapshot {
  const snapshot: ContextSnapshot = {};
  for (const entry of entries.values()) {
    if (!entry.tombstoned) {
      snapshot[entry.key] = entry.value;
    }
  }
  return snapshot;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
