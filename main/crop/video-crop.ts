import type { CropRect } from '../../src/types/crop'
import type { CropConfig } from '../config'
import { DEFAULT_CROP_CONFIG } from '../config'
import { getMediaDuration } from '../media/media-probe'
import { logger } from '../utils/logger'
import type { ProcessLauncher } from '../utils/process-launcher'
import { createChildEnv } from '../utils/process-launcher'
import { buildVideoCropArgs } from './ffmpeg-crop-args'
import type { JobOutcome } from './process-supervisor'
import { ProcessSupervisor } from './process-supervisor'

const log = logger.child('VideoCrop')

export interface VideoCropOptions {
  ffmpegPath: string
  inputPath: string
  outputPath: string
  region: Readonly<CropRect>
  encoder?: string | null
  /** Seconds. Probed when undefined; null means unknown */
  durationSeconds?: number | null
  signal?: AbortSignal
  onProgress?: (percent: number | null) => void
  config?: Pick<CropConfig, 'pollIntervalMs' | 'gracePeriodMs'>
  launch?: ProcessLauncher
}

export type VideoCropper = (options: VideoCropOptions) => Promise<JobOutcome>

export const cropVideo: VideoCropper = async (options) => {
  const durationSeconds =
    options.durationSeconds === undefined ? await getMediaDuration(options.inputPath) : options.durationSeconds
  if (durationSeconds === null) {
    log.info(`Duration unknown for ${options.inputPath}, progress will be indeterminate`)
  }

  const config = options.config ?? DEFAULT_CROP_CONFIG
  const supervisor = new ProcessSupervisor({
    command: options.ffmpegPath,
    args: buildVideoCropArgs({
      inputPath: options.inputPath,
      outputPath: options.outputPath,
      region: options.region,
      encoder: options.encoder ?? null,
    }),
    env: createChildEnv(options.ffmpegPath),
    outputPath: options.outputPath,
    signal: options.signal,
    durationSeconds,
    onProgress: options.onProgress,
    pollIntervalMs: config.pollIntervalMs,
    gracePeriodMs: config.gracePeriodMs,
    launch: options.launch,
    logger: log,
  })

  const outcome = await supervisor.run()
  log.info(`${options.inputPath}: ${outcome.status}`)
  return outcome
}
