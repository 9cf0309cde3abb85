import { NotImplementedException } from '@nestjs/common';
import { types } from 'util';
import {
  DispatchMode,
  InstrumentedRequest,
  InstrumentedResponse,
  RequestHandler,
} from '@logging/domain';

const COOPERATIVE = Symbol('cooperative');

type AnyHandler = (...args: never[]) => unknown;

/**
 * Mark a handler as returning a promise even though it is not declared
 * `async` (a bound method, a `.then()` chain, ...).
 */
export function markCooperative<T extends AnyHandler>(handler: T): T {
  Object.defineProperty(handler, COOPERATIVE, { value: true });
  return handler;
}

function isCooperative(handler: AnyHandler): boolean {
  return types.isAsyncFunction(handler) || COOPERATIVE in handler;
}

/**
 * MiddlewareDispatcher - base for middleware that wraps a downstream handler
 * which is either blocking or cooperative.
 *
 * The mode is decided once, from the handler, when the middleware is built;
 * `handle()` never inspects the handler again. Subclasses implement the
 * path(s) they support.
 */
export abstract class MiddlewareDispatcher<
  TRequest extends InstrumentedRequest = InstrumentedRequest,
  TResponse extends InstrumentedResponse = InstrumentedResponse,
> {
  readonly mode: DispatchMode;

  constructor(protected readonly handler: RequestHandler<TRequest, TResponse>) {
    this.mode = isCooperative(handler)
      ? DispatchMode.COOPERATIVE
      : DispatchMode.BLOCKING;
  }

  handle(request: TRequest): TResponse | Promise<TResponse> {
    if (this.mode === DispatchMode.COOPERATIVE) {
      return this.handleCooperative(request);
    }
    return this.handleBlocking(request);
  }

  protected handleBlocking(_request: TRequest): TResponse {
    throw new NotImplementedException(
      `${this.constructor.name} does not implement handleBlocking()`,
    );
  }

  protected handleCooperative(_request: TRequest): Promise<TResponse> {
    return Promise.reject(
      new NotImplementedException(
        `${this.constructor.name} does not implement handleCooperative()`,
      ),
    );
  }

  toString(): string {
    return `<${this.constructor.name} handler=${this.handler.name || 'anonymous'} mode=${this.mode}>`;
  }
}
