export * from './format-hint'
export * from './formats'
export * from './palette'
