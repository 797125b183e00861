export * from './trace-context';
export * from './trace-logger';
