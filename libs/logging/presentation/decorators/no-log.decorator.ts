import { SetMetadata } from '@nestjs/common';

export const NO_LOG_KEY = 'no_log';

/**
 * @NoLog - Excludes a route, or every route of a controller, from request
 * logging. The handler still runs; no REQUEST STARTED/FINISHED records are
 * written and no request context is bound.
 *
 * Use for health checks and other high-frequency endpoints.
 *
 * @example
 * ```typescript
 * @Get('health')
 * @NoLog()
 * healthCheck() {
 *   return { status: 'ok' };
 * }
 * ```
 */
export const NoLog = () => SetMetadata(NO_LOG_KEY, true);
