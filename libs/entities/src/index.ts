export * from './image-artifact.entity';
