export * from './messages.dto';
export * from './parse-message';
export * from './process-batch';
export * from './queue-jobs.types';
export * from './queue-message';
