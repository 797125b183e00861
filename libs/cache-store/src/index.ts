export * from './cache-keys';
export * from './cache-store.module';
export * from './cache-store.types';
export * from './key-value-store.interface';
export * from './redis-key-value.store';
export * from './status.service';
export * from './weather-cache.service';
export * from './zip-registry.service';
