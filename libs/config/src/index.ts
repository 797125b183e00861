export * from './database.config';
export * from './env.validation';
export * from './pipeline.config';
export * from './redis.config';
