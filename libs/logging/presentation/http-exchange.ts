import { HttpException, StreamableFile } from '@nestjs/common';
import type { Request, Response } from 'express';
import { Readable } from 'stream';
import {
  BodyChunk,
  HeaderBag,
  HeaderValue,
  InstrumentedRequest,
  InstrumentedResponse,
  QueryParams,
  RequestPrincipal,
  ResponseBody,
  TransportMeta,
} from '@logging/domain';
import { CONTENT_TYPE_HEADER } from '@logging/value-objects';

/**
 * HttpRequest - Express request seen through the InstrumentedRequest
 * contract, carrying the continuation that runs the rest of the Nest
 * pipeline.
 */
export class HttpRequest implements InstrumentedRequest {
  ipAddress?: string;

  constructor(
    private readonly req: Request,
    readonly proceed: () => Promise<HttpResponse>,
  ) {}

  get method(): string {
    return this.req.method;
  }

  get path(): string {
    return this.req.path;
  }

  get query(): QueryParams {
    return this.req.query;
  }

  get headers(): HeaderBag {
    return this.req.headers;
  }

  get meta(): TransportMeta {
    const id: unknown = Reflect.get(this.req, 'id');
    return {
      remoteAddress: this.req.socket?.remoteAddress,
      requestId: typeof id === 'string' ? id : undefined,
    };
  }

  /** Whatever an auth guard attached as `req.user`, if it has an id. */
  get user(): RequestPrincipal | undefined {
    const user: unknown = Reflect.get(this.req, 'user');
    if (typeof user !== 'object' || user === null || !('id' in user)) {
      return undefined;
    }
    const { id } = user;
    if (typeof id !== 'string' && typeof id !== 'number') {
      return undefined;
    }
    const isAuthenticated =
      'isAuthenticated' in user && typeof user.isAuthenticated === 'boolean'
        ? user.isAuthenticated
        : true;
    return { ...user, id, isAuthenticated };
  }
}

/**
 * HttpResponse - the value a route handler returned, plus the Express
 * response it will be written to.
 *
 * Nest writes status and headers only after the interceptor chain has
 * finished, so until then they are derived from the route metadata and the
 * payload the same way the Express adapter will derive them.
 *
 * A route that threw an HttpException is a response too: Nest's exception
 * filter writes it as JSON with the exception's status. `toResult()` throws
 * it again so the filter still sees it.
 */
export class HttpResponse implements InstrumentedResponse<BodyChunk> {
  body?: ResponseBody<BodyChunk>;

  constructor(
    private readonly res: Response,
    readonly payload: unknown,
    private readonly defaultStatus: number,
    readonly exception?: HttpException,
  ) {
    if (payload instanceof StreamableFile) {
      this.body = payload.getStream();
    }
  }

  static fromException(res: Response, exception: HttpException): HttpResponse {
    return new HttpResponse(res, exception.getResponse(), exception.getStatus(), exception);
  }

  get streaming(): boolean {
    return this.payload instanceof StreamableFile;
  }

  get statusCode(): number {
    return this.res.headersSent ? this.res.statusCode : this.defaultStatus;
  }

  getHeader(name: string): HeaderValue | number {
    const value = this.res.getHeader(name);
    if (value !== undefined || name.toLowerCase() !== CONTENT_TYPE_HEADER) {
      return value;
    }
    return this.inferContentType();
  }

  /**
   * The value to hand back to Nest: the payload itself, or for a streamed
   * file a new StreamableFile over the instrumented body. Throws the route's
   * HttpException, if it had one.
   */
  toResult(): unknown {
    if (this.exception) {
      throw this.exception;
    }
    if (!(this.payload instanceof StreamableFile) || this.body === undefined) {
      return this.payload;
    }
    return new StreamableFile(Readable.from(this.body), this.payload.getHeaders());
  }

  private inferContentType(): string | undefined {
    const payload = this.payload;
    if (payload instanceof StreamableFile) {
      return payload.getHeaders().type;
    }
    if (this.exception) {
      return 'application/json; charset=utf-8';
    }
    if (payload === undefined || payload === null) {
      return undefined;
    }
    if (typeof payload === 'object') {
      return 'application/json; charset=utf-8';
    }
    return 'text/html; charset=utf-8';
  }
}
