export * from './artifact-store.interface';
export * from './artifact-store.module';
export * from './typeorm-artifact.store';
