export * from './context-entry';
export * from './dispatch-mode.enum';
export * from './elapsed-time';
export * from './errors';
export * from './field-template';
export * from './log-record';
export * from './query-record';
export * from './request.interface';
