import { Logger } from '@nestjs/common';
import { isCancellation } from '@logging/domain';

type StreamState = 'idle' | 'streaming' | 'done';

/**
 * Shared start/finish/failure bookkeeping for the stream adapters below.
 */
abstract class StreamInstrumentation {
  protected state: StreamState = 'idle';

  constructor(
    protected readonly requestId: string,
    protected readonly logger: Logger,
  ) {}

  protected begin(): void {
    if (this.state === 'idle') {
      this.state = 'streaming';
      this.logger.log(`Streaming started: request_id=${this.requestId}`);
    }
  }

  protected finish(): void {
    this.state = 'done';
    this.logger.log(`Streaming finished: request_id=${this.requestId}`);
  }

  protected cancelled(): void {
    this.state = 'done';
    this.logger.warn(`Streaming was cancelled: request_id=${this.requestId}`);
  }

  protected fail(error: unknown): void {
    if (isCancellation(error)) {
      this.cancelled();
      return;
    }
    this.state = 'done';
    this.logger.error(
      `Streaming failed: request_id=${this.requestId}`,
      error instanceof Error ? error.stack : String(error),
    );
  }
}

/**
 * InstrumentedStream - iterator over a synchronous body that logs the start,
 * the end and any failure of draining it. Items pass through one at a time,
 * exactly as the source produces them.
 */
export class InstrumentedStream<T>
  extends StreamInstrumentation
  implements IterableIterator<T>
{
  private iterator?: Iterator<T>;

  constructor(
    private readonly source: Iterable<T>,
    requestId: string,
    logger: Logger,
  ) {
    super(requestId, logger);
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this;
  }

  next(): IteratorResult<T> {
    if (this.state === 'done') {
      return { done: true, value: undefined };
    }
    this.begin();

    let result: IteratorResult<T>;
    try {
      this.iterator ??= this.source[Symbol.iterator]();
      result = this.iterator.next();
    } catch (error) {
      this.fail(error);
      throw error;
    }

    if (result.done) {
      this.finish();
    }
    return result;
  }

  return(value?: T): IteratorResult<T> {
    if (this.state === 'streaming') {
      this.cancelled();
      this.iterator?.return?.(value);
    }
    this.state = 'done';
    return { done: true, value };
  }
}

/**
 * InstrumentedAsyncStream - the async counterpart of InstrumentedStream.
 *
 * A consumer that stops early (`return()`, e.g. when the client goes away)
 * or a source that rejects with an AbortError counts as a cancellation and is
 * logged as a warning; any other rejection is logged as an error. Either way
 * the rejection reaches the consumer unchanged.
 */
export class InstrumentedAsyncStream<T>
  extends StreamInstrumentation
  implements AsyncIterableIterator<T>
{
  private iterator?: AsyncIterator<T>;

  constructor(
    private readonly source: AsyncIterable<T>,
    requestId: string,
    logger: Logger,
  ) {
    super(requestId, logger);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  async next(): Promise<IteratorResult<T>> {
    if (this.state === 'done') {
      return { done: true, value: undefined };
    }
    this.begin();

    let result: IteratorResult<T>;
    try {
      this.iterator ??= this.source[Symbol.asyncIterator]();
      result = await this.iterator.next();
    } catch (error) {
      this.fail(error);
      throw error;
    }

    if (result.done) {
      this.finish();
    }
    return result;
  }

  async return(value?: T): Promise<IteratorResult<T>> {
    if (this.state === 'streaming') {
      this.cancelled();
      await this.iterator?.return?.(value);
    }
    this.state = 'done';
    return { done: true, value };
  }
}
