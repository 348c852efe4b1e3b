export * from './constants'
export * from './coordinate-mapper'
export * from './crop-region'
export * from './aspect-ratio'
export * from './numeric-edit'
export * from './hit-testing'
export * from './interaction-controller'
