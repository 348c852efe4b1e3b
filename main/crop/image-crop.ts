import type { CropRect } from '../../src/types/crop'
import type { CropConfig } from '../config'
import { loadCropConfig } from '../config'
import { resolveFfmpegPath } from '../utils/ffmpeg-resolver'
import { logger } from '../utils/logger'
import type { ProcessLauncher } from '../utils/process-launcher'
import { createChildEnv } from '../utils/process-launcher'
import { isCropError } from './errors'
import { buildImageCropArgs } from './ffmpeg-crop-args'
import type { JobOutcome } from './process-supervisor'
import { ProcessSupervisor, failedOutcome } from './process-supervisor'

export interface ImageCropRequest {
  inputPath: string
  outputPath: string
  region: Readonly<CropRect>
  signal?: AbortSignal
}

/** Copies a sub-rectangle of a still image into a new file of the same format. */
export interface ImageCropper {
  crop(request: ImageCropRequest): Promise<JobOutcome>
}

export interface FfmpegImageCropperOptions {
  config?: CropConfig
  ffmpegPath?: string
  launch?: ProcessLauncher
}

/**
 * Single-frame ffmpeg crop; the output format follows the output file's extension.
 * Depends on ffmpeg like the video jobs do: without it every crop fails with
 * `external-tool-missing`. Pass another ImageCropper to crop stills without ffmpeg.
 */
export class FfmpegImageCropper implements ImageCropper {
  private readonly config: CropConfig
  private readonly launch?: ProcessLauncher
  private ffmpegPath: string | null
  private readonly log = logger.child('ImageCrop')

  constructor(options: FfmpegImageCropperOptions = {}) {
    this.config = options.config ?? loadCropConfig()
    this.ffmpegPath = options.ffmpegPath ?? null
    this.launch = options.launch
  }

  async crop(request: ImageCropRequest): Promise<JobOutcome> {
    let ffmpegPath: string
    try {
      ffmpegPath = this.ffmpegPath ?? resolveFfmpegPath(this.config)
    } catch (error) {
      if (isCropError(error)) return failedOutcome(error)
      throw error
    }
    this.ffmpegPath = ffmpegPath

    const supervisor = new ProcessSupervisor({
      command: ffmpegPath,
      args: buildImageCropArgs(request.inputPath, request.outputPath, request.region),
      env: createChildEnv(ffmpegPath),
      outputPath: request.outputPath,
      signal: request.signal,
      pollIntervalMs: this.config.pollIntervalMs,
      gracePeriodMs: this.config.gracePeriodMs,
      launch: this.launch,
      logger: this.log,
    })
    return supervisor.run()
  }
}
