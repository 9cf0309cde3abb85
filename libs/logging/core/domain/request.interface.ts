/**
 * Request/response contracts the instrumentation works against.
 *
 * They describe only what request logging reads; framework adapters
 * (see HttpExchange) map their own objects onto them.
 */

export type HeaderValue = string | string[] | undefined;

export type HeaderBag = Record<string, HeaderValue>;

export type QueryParams = Record<string, unknown>;

/** Transport-level metadata that does not arrive as a header. */
export interface TransportMeta {
  remoteAddress?: string;
  requestId?: string;
}

/**
 * The authenticated principal, when the application resolved one.
 * Identity fields (username, email, ...) are looked up by name.
 */
export interface RequestPrincipal {
  isAuthenticated: boolean;
  id: string | number;
  [field: string]: unknown;
}

export interface InstrumentedRequest {
  readonly method: string;
  readonly path: string;
  readonly query: QueryParams;
  readonly headers: HeaderBag;
  readonly meta: TransportMeta;
  readonly user?: RequestPrincipal;
  /** Caller address, cached by the instrumentation after the first lookup. */
  ipAddress?: string;
}

export type BodyChunk = string | Uint8Array;

export type ResponseBody<T = BodyChunk> = Iterable<T> | AsyncIterable<T>;

export interface InstrumentedResponse<T = BodyChunk> {
  readonly statusCode: number;
  getHeader(name: string): HeaderValue | number;
  /** Set for responses whose body is produced incrementally. */
  readonly streaming?: boolean;
  body?: ResponseBody<T>;
}

export type BlockingHandler<
  TRequest extends InstrumentedRequest = InstrumentedRequest,
  TResponse extends InstrumentedResponse = InstrumentedResponse,
> = (request: TRequest) => TResponse;

export type CooperativeHandler<
  TRequest extends InstrumentedRequest = InstrumentedRequest,
  TResponse extends InstrumentedResponse = InstrumentedResponse,
> = (request: TRequest) => Promise<TResponse>;

export type RequestHandler<
  TRequest extends InstrumentedRequest = InstrumentedRequest,
  TResponse extends InstrumentedResponse = InstrumentedResponse,
> =
  | BlockingHandler<TRequest, TResponse>
  | CooperativeHandler<TRequest, TResponse>;

export function headerValue(headers: HeaderBag, name: string): string | undefined {
  const raw = headers[name.toLowerCase()];
  if (Array.isArray(raw)) {
    return raw[0];
  }
  return raw;
}
