export * from './clock';
export * from './date.util';
export * from './errors';
export * from './guards';
export * from './zip';
