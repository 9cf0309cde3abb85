export { QueryLogPort } from './query-log.port';
