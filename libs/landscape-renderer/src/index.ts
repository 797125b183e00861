export * from './bmp-encoder'
export * from './landscape-renderer.config'
export * from './landscape-renderer.module'
export * from './landscape-renderer.service'
export * from './landscape-renderer.types'
export * from './landscape-svg'
export * from './weather-timeline'
