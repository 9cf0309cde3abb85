/**
 * Raised when a restore token is reused or handed to a frame that did not
 * issue it.
 */
export class ContextTokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContextTokenError';
  }
}

/**
 * Error raised when in-flight work is abandoned, mirroring the DOM
 * `AbortError` that `AbortSignal` and Node's stream APIs reject with.
 */
export class CancellationError extends Error {
  constructor(message = 'The operation was aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
