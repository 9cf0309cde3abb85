import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  NestInterceptor,
  RequestMethod,
} from '@nestjs/common';
import { HTTP_CODE_METADATA } from '@nestjs/common/constants';
import { Reflector } from '@nestjs/core';
import type { Request, Response } from 'express';
import { Observable, defer, lastValueFrom } from 'rxjs';
import { map } from 'rxjs/operators';
import { ContextStore, RequestInstrumentation } from '@logging/service';
import { NO_LOG_KEY } from './decorators/no-log.decorator';
import { HttpRequest, HttpResponse } from './http-exchange';
import { RequestLogMiddleware } from './request-log.middleware';

/**
 * RequestLogInterceptor - runs every HTTP route through RequestLogMiddleware.
 *
 * Register it once as APP_INTERCEPTOR. The rest of the Nest pipeline (later
 * interceptors, pipes, the route handler) runs as the middleware's
 * cooperative handler, inside the request's context frame, so everything it
 * logs carries request_id, ip_address and user_agent.
 */
@Injectable()
export class RequestLogInterceptor implements NestInterceptor {
  private readonly middleware: RequestLogMiddleware<HttpRequest, HttpResponse>;

  constructor(
    instrumentation: RequestInstrumentation,
    contextStore: ContextStore,
    private readonly reflector: Reflector,
  ) {
    this.middleware = new RequestLogMiddleware<HttpRequest, HttpResponse>(
      async (request: HttpRequest) => request.proceed(),
      instrumentation,
      contextStore,
    );
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const skip = this.reflector.getAllAndOverride<boolean | undefined>(
      NO_LOG_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (context.getType() !== 'http' || skip) {
      return next.handle();
    }

    const http = context.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();
    const status = this.defaultStatus(context, req);

    // An HttpException still finishes the request; toResult() rethrows it.
    const request = new HttpRequest(req, async () => {
      try {
        const payload: unknown = await lastValueFrom(next.handle(), {
          defaultValue: undefined,
        });
        return new HttpResponse(res, payload, status);
      } catch (error) {
        if (error instanceof HttpException) {
          return HttpResponse.fromException(res, error);
        }
        throw error;
      }
    });

    return defer(async () => this.middleware.handle(request)).pipe(
      map((response) => response.toResult()),
    );
  }

  /** The status Nest will apply once the handler's value is written. */
  private defaultStatus(context: ExecutionContext, req: Request): number {
    const declared = this.reflector.get<number | undefined>(
      HTTP_CODE_METADATA,
      context.getHandler(),
    );
    if (declared !== undefined) {
      return declared;
    }
    return req.method === RequestMethod[RequestMethod.POST]
      ? HttpStatus.CREATED
      : HttpStatus.OK;
  }
}
