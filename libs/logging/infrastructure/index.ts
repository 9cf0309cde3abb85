export * from './formatters';
export * from './query-log';
export { MongoConnectionClient } from './mongodb/mongo.client';
export { contextMerge, mergeContext } from './winston/context-merge.format';
export { exactLevel } from './winston/level.format';
export { createLoggingBackend } from './winston/logger.factory';
export { renderWith } from './winston/render.format';
export { WinstonLogger } from './winston/winston.logger';
