import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { performance } from 'perf_hooks';
import {
  InstrumentedRequest,
  InstrumentedResponse,
  formatElapsedTime,
  headerValue,
  summarizeQueries,
} from '@logging/domain';
import { QueryLogPort } from '@logging/out-ports';
import {
  CONTENT_TYPE_HEADER,
  FORWARDED_FOR_HEADER,
  LogMarker,
  REFERRER_HEADER,
  REQUEST_ID_HEADER,
  RequestContextKey,
  USER_AGENT_HEADER,
} from '@logging/value-objects';
import { LOGGING_CONFIG_KEY, LoggingSettings } from '@config';
import { ContextStore } from './context-store.service';
import {
  InstrumentedAsyncStream,
  InstrumentedStream,
} from './instrumented-stream';

/**
 * RequestInstrumentation - per-request bookkeeping shared by the blocking and
 * the cooperative middleware paths.
 *
 * `prepare()` binds the request context and logs the start of the request,
 * `finalize()` logs the outcome and clears the context again. Neither touches
 * the response; failures in the handler are the caller's to propagate.
 */
@Injectable()
export class RequestInstrumentation {
  private readonly logger = new Logger(RequestInstrumentation.name);
  private readonly settings: LoggingSettings;

  // query count sampled by prepare(), keyed by request
  private readonly queryCounts = new WeakMap<InstrumentedRequest, number>();

  constructor(
    private readonly contextStore: ContextStore,
    private readonly queryLog: QueryLogPort,
    configService: ConfigService,
  ) {
    this.settings = configService.getOrThrow<LoggingSettings>(LOGGING_CONFIG_KEY);
  }

  /**
   * Bind request_id, ip_address and user_agent for this request and log
   * REQUEST STARTED.
   *
   * @returns the request id in effect for the request
   */
  prepare(request: InstrumentedRequest): string {
    const requestId = this.resolveRequestId(request);

    this.contextStore.bind({
      [RequestContextKey.REQUEST_ID]: requestId,
      [RequestContextKey.IP_ADDRESS]: this.clientIp(request),
      [RequestContextKey.USER_AGENT]:
        headerValue(request.headers, USER_AGENT_HEADER) ??
        LogMarker.UNKNOWN_USER_AGENT,
    });

    if (this.settings.queryCountingEnabled) {
      this.queryCounts.set(request, this.queryLog.count());
    }

    const query =
      Object.keys(request.query).length > 0
        ? JSON.stringify(request.query)
        : LogMarker.NONE;
    const referrer = headerValue(request.headers, REFERRER_HEADER) ?? LogMarker.NONE;

    this.logger.log(
      'REQUEST STARTED:\n' +
        `\tmethod=${request.method}\n` +
        `\tpath=${request.path}\n` +
        `\tquery_params=${query}\n` +
        `\treferrer=${referrer}\n`,
    );

    return requestId;
  }

  /**
   * Log REQUEST FINISHED for a response produced by the handler, then clear
   * the request context.
   *
   * @param startTime `performance.now()` sampled before the handler ran
   */
  finalize(
    request: InstrumentedRequest,
    response: InstrumentedResponse,
    startTime: number,
  ): void {
    try {
      const elapsed = formatElapsedTime((performance.now() - startTime) / 1000);
      const contentType = response.getHeader(CONTENT_TYPE_HEADER);

      this.logger.log(
        'REQUEST FINISHED:\n' +
          `\tuser=${this.principal(request)}\n` +
          `\tstatus_code=${response.statusCode}\n` +
          `\tcontent_type=[${contentType === undefined ? LogMarker.UNKNOWN : String(contentType)}]\n` +
          `\tresponse_time=[${elapsed}]\n` +
          `\t${this.querySummary(request) ?? ''}`,
      );
    } finally {
      this.release(request);
    }
  }

  /** Clear every context entry of the current request. Safe to call twice. */
  release(request: InstrumentedRequest): void {
    this.queryCounts.delete(request);
    this.contextStore.clearAll();
  }

  wrapStream<T>(source: Iterable<T>, requestId: string): InstrumentedStream<T> {
    return new InstrumentedStream(source, requestId, this.logger);
  }

  wrapAsyncStream<T>(
    source: AsyncIterable<T>,
    requestId: string,
  ): InstrumentedAsyncStream<T> {
    return new InstrumentedAsyncStream(source, requestId, this.logger);
  }

  /** Header first, then whatever the transport assigned, then a fresh id. */
  private resolveRequestId(request: InstrumentedRequest): string {
    return (
      headerValue(request.headers, REQUEST_ID_HEADER) ||
      request.meta.requestId ||
      randomUUID()
    );
  }

  /**
   * The first address of X-Forwarded-For when a proxy sent one, otherwise the
   * peer address. Cached on the request.
   */
  private clientIp(request: InstrumentedRequest): string {
    if (request.ipAddress !== undefined) {
      return request.ipAddress;
    }

    const forwarded = headerValue(request.headers, FORWARDED_FOR_HEADER)
      ?.split(',')[0]
      ?.trim();

    request.ipAddress =
      forwarded || request.meta.remoteAddress || LogMarker.UNKNOWN_IP;
    return request.ipAddress;
  }

  private principal(request: InstrumentedRequest): string {
    const user = request.user;
    if (!user?.isAuthenticated) {
      return LogMarker.ANONYMOUS;
    }
    const name = user[this.settings.usernameField];
    return `[${String(name)} (ID:${user.id})]`;
  }

  private querySummary(request: InstrumentedRequest): string | undefined {
    const sampled = this.queryCounts.get(request);
    if (!this.settings.queryCountingEnabled || sampled === undefined) {
      return undefined;
    }
    return summarizeQueries(this.queryLog.since(sampled));
  }
}
