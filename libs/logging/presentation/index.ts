export * from './decorators';
export { HttpRequest, HttpResponse } from './http-exchange';
export { MiddlewareDispatcher, markCooperative } from './middleware-dispatcher';
export { RequestLogInterceptor } from './request-log.interceptor';
export { RequestLogMiddleware } from './request-log.middleware';
