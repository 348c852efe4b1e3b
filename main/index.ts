export * from './config'
export { logger, Logger } from './utils/logger'
export { resolveFfmpegPath, resolveFfprobePath } from './utils/ffmpeg-resolver'
export { createChildEnv, spawnProcess } from './utils/process-launcher'
export type { LaunchedProcess, ProcessLauncher } from './utils/process-launcher'
export * from './crop/errors'
export * from './crop/progress-parser'
export * from './crop/process-supervisor'
export * from './crop/ffmpeg-crop-args'
export * from './crop/hw-encoder'
export * from './crop/video-crop'
export * from './crop/image-crop'
export * from './crop/output-naming'
export * from './crop/batch-channel'
export * from './crop/crop-executor'
export * from './media/media-probe'
export * from './media/frame-extractor'
