import type { CropConfig } from '../config'
import { loadCropConfig } from '../config'
import { buildFrameExtractArgs } from '../crop/ffmpeg-crop-args'
import { ProcessSupervisor } from '../crop/process-supervisor'
import { resolveFfmpegPath } from '../utils/ffmpeg-resolver'
import { logger } from '../utils/logger'
import type { ProcessLauncher } from '../utils/process-launcher'
import { createChildEnv } from '../utils/process-launcher'
import { getMediaDuration } from './media-probe'

const log = logger.child('MediaProbe')

/** Frames this far in tend to be past fade-ins and title cards */
export const REPRESENTATIVE_FRAME_FRACTION = 0.1
export const REPRESENTATIVE_FRAME_MAX_SECONDS = 5

export function getRepresentativeFrameTime(durationSeconds: number | null): number {
  if (durationSeconds === null || durationSeconds <= 0) return 0
  return Math.min(durationSeconds * REPRESENTATIVE_FRAME_FRACTION, REPRESENTATIVE_FRAME_MAX_SECONDS)
}

export interface ExtractFrameOptions {
  atSeconds?: number
  /** Skips the duration probe when the caller already knows it */
  durationSeconds?: number | null
  signal?: AbortSignal
  config?: CropConfig
  ffmpegPath?: string
  launch?: ProcessLauncher
}

/**
 * Write one frame of a video as an image so a crop rectangle can be drawn on it.
 * Resolves to the output path; rejects with the process error on failure.
 */
export async function extractRepresentativeFrame(
  videoPath: string,
  outputPath: string,
  options: ExtractFrameOptions = {}
): Promise<string> {
  const config = options.config ?? loadCropConfig()
  const ffmpegPath = options.ffmpegPath ?? resolveFfmpegPath(config)

  let atSeconds = options.atSeconds
  if (atSeconds === undefined) {
    const duration =
      options.durationSeconds === undefined ? await getMediaDuration(videoPath) : options.durationSeconds
    atSeconds = getRepresentativeFrameTime(duration)
  }

  const supervisor = new ProcessSupervisor({
    command: ffmpegPath,
    args: buildFrameExtractArgs(videoPath, outputPath, atSeconds),
    env: createChildEnv(ffmpegPath),
    outputPath,
    signal: options.signal,
    pollIntervalMs: config.pollIntervalMs,
    gracePeriodMs: config.gracePeriodMs,
    launch: options.launch,
    logger: log,
  })

  const outcome = await supervisor.run()
  switch (outcome.status) {
    case 'success':
      log.debug(`Extracted frame at ${atSeconds}s from ${videoPath}`)
      return outputPath
    case 'cancelled':
      throw new Error(`Frame extraction cancelled for ${videoPath}`)
    case 'failed':
      throw outcome.error
  }
}
