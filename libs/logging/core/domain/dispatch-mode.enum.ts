/**
 * DispatchMode - how a middleware calls its downstream handler.
 *
 * BLOCKING: the handler returns the response directly.
 * COOPERATIVE: the handler returns a promise of the response.
 */
export enum DispatchMode {
  BLOCKING = 'BLOCKING',
  COOPERATIVE = 'COOPERATIVE',
}
