import { Logger } from '@nestjs/common';
import { performance } from 'perf_hooks';
import {
  InstrumentedRequest,
  InstrumentedResponse,
  RequestHandler,
  ResponseBody,
  isCancellation,
} from '@logging/domain';
import { ContextStore, RequestInstrumentation } from '@logging/service';
import { MiddlewareDispatcher } from './middleware-dispatcher';

/**
 * RequestLogMiddleware - logs the start and the end of every request it
 * forwards, with request_id, ip_address and user_agent bound for everything
 * the handler logs in between.
 *
 * Each request runs in its own context frame, so concurrent requests never
 * see each other's bindings. Responses are returned as the handler produced
 * them, except that a streaming body is swapped for an instrumented view of
 * the same items.
 */
export class RequestLogMiddleware<
  TRequest extends InstrumentedRequest = InstrumentedRequest,
  TResponse extends InstrumentedResponse = InstrumentedResponse,
> extends MiddlewareDispatcher<TRequest, TResponse> {
  private readonly logger = new Logger(RequestLogMiddleware.name);

  constructor(
    handler: RequestHandler<TRequest, TResponse>,
    private readonly instrumentation: RequestInstrumentation,
    private readonly contextStore: ContextStore,
  ) {
    super(handler);
  }

  protected handleBlocking(request: TRequest): TResponse {
    return this.contextStore.fork(() => {
      try {
        const requestId = this.instrumentation.prepare(request);
        const startTime = performance.now();

        const response = this.handler(request);
        if (response instanceof Promise) {
          throw new TypeError(
            `${this.toString()} got a promise from a blocking handler`,
          );
        }

        this.instrumentBody(response, requestId);
        this.instrumentation.finalize(request, response, startTime);
        return response;
      } finally {
        this.instrumentation.release(request);
      }
    });
  }

  protected handleCooperative(request: TRequest): Promise<TResponse> {
    return this.contextStore.fork(async () => {
      let requestId: string | undefined;
      try {
        requestId = this.instrumentation.prepare(request);
        const startTime = performance.now();

        const response = await this.handler(request);

        this.instrumentBody(response, requestId);
        this.instrumentation.finalize(request, response, startTime);
        return response;
      } catch (error) {
        if (isCancellation(error)) {
          this.logger.warn(`Request was cancelled: request_id=${requestId}`);
        }
        throw error;
      } finally {
        this.instrumentation.release(request);
      }
    });
  }

  private instrumentBody(response: TResponse, requestId: string): void {
    const body = response.body;
    if (!response.streaming || body === undefined) {
      return;
    }
    response.body = this.wrapBody(body, requestId);
  }

  private wrapBody<T>(body: ResponseBody<T>, requestId: string): ResponseBody<T> {
    if (Symbol.asyncIterator in body) {
      return this.instrumentation.wrapAsyncStream(body, requestId);
    }
    return this.instrumentation.wrapStream(body, requestId);
  }
}
