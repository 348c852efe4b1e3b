export * from './types/crop'
export * from './types/media'
export * from './types/batch'
export * from './features/crop'
export * from './features/viewport/viewport-navigator'
export * from './features/media/dimension-groups'
export * from './stores/media-catalog-store'
export * from './stores/batch-progress-store'
