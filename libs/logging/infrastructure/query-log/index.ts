export { InMemoryQueryLog } from './in-memory.query-log';
export {
  CommandMonitor,
  FinishedCommand,
  MongoQueryLog,
  StartedCommand,
} from './mongo.query-log';
