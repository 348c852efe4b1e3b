/**
 * CropExecutor
 *
 * Applies one committed crop rectangle to a batch of files:
 * 1. probe every candidate; unreadable files and files whose size differs from the
 *    reference are reported and never written
 * 2. still images run first through the ImageCropper
 * 3. videos run one at a time through a supervised ffmpeg process
 *
 * A failed file never stops the batch. Cancellation is checked before every job; jobs
 * that have not started when the signal fires are reported as cancelled.
 */

import { mkdir } from 'fs/promises'
import type {
  BatchMessage,
  BatchSummary,
  CropBatchRequest,
  CropJob,
  JobResult,
} from '../../src/types/batch'
import type { CropRect } from '../../src/types/crop'
import type { MediaItem, MediaProbe } from '../../src/types/media'
import { MIN_CROP_SIZE } from '../../src/features/crop/constants'
import { isRegionWithinBounds } from '../../src/features/crop/crop-region'
import { hasSameDimensions } from '../../src/features/media/dimension-groups'
import type { CropConfig } from '../config'
import { loadCropConfig } from '../config'
import { createMediaProbe } from '../media/media-probe'
import { resolveFfmpegPath } from '../utils/ffmpeg-resolver'
import { logger } from '../utils/logger'
import type { ProcessLauncher } from '../utils/process-launcher'
import { InvalidCropRegionError, isCropError } from './errors'
import type { CropError } from './errors'
import { detectHardwareEncoder } from './hw-encoder'
import type { ImageCropper } from './image-crop'
import { FfmpegImageCropper } from './image-crop'
import type { PathExists } from './output-naming'
import { pathExists, resolveOutputPath } from './output-naming'
import type { JobOutcome } from './process-supervisor'
import type { VideoCropper } from './video-crop'
import { cropVideo } from './video-crop'

const log = logger.child('CropExecutor')

export interface CropExecutorOptions {
  config?: CropConfig
  probe?: MediaProbe
  imageCropper?: ImageCropper
  videoCropper?: VideoCropper
  /** Throws ExternalToolMissingError when ffmpeg is unavailable */
  resolveFfmpeg?: () => string
  detectEncoder?: (ffmpegPath: string) => Promise<string | null>
  launch?: ProcessLauncher
  exists?: PathExists
}

type PlannedJob = Omit<CropJob, 'outputPath'> & { duration?: number }

type VideoTooling = { ffmpegPath: string; encoder: string | null } | { error: CropError }

export function validateCropRegion(region: Readonly<CropRect>, reference: MediaItem): void {
  if (!isRegionWithinBounds(region, reference, MIN_CROP_SIZE)) {
    throw new InvalidCropRegionError(
      `Crop region ${region.width}x${region.height}+${region.x}+${region.y} does not fit ` +
        `the reference ${reference.width}x${reference.height}`
    )
  }
}

export function summarizeJobs(jobs: JobResult[]): BatchSummary {
  const summary: BatchSummary = {
    succeeded: 0,
    skippedForSize: 0,
    skippedUnreadable: 0,
    failed: 0,
    cancelled: 0,
    jobs,
  }
  for (const job of jobs) {
    switch (job.status) {
      case 'succeeded':
        summary.succeeded++
        break
      case 'skipped-for-size':
        summary.skippedForSize++
        break
      case 'skipped-unreadable':
        summary.skippedUnreadable++
        break
      case 'failed':
        summary.failed++
        break
      case 'cancelled':
        summary.cancelled++
        break
    }
  }
  return summary
}

function outcomeToResult(job: PlannedJob, outputPath: string, outcome: JobOutcome): JobResult {
  switch (outcome.status) {
    case 'success':
      return { sourcePath: job.sourcePath, kind: job.kind, outputPath, status: 'succeeded' }
    case 'cancelled':
      return { sourcePath: job.sourcePath, kind: job.kind, outputPath: null, status: 'cancelled' }
    case 'failed':
      return {
        sourcePath: job.sourcePath,
        kind: job.kind,
        outputPath: null,
        status: 'failed',
        reason: outcome.reason,
        code: outcome.code,
      }
  }
}

export class CropExecutor {
  private readonly config: CropConfig
  private readonly probe: MediaProbe
  private readonly imageCropper: ImageCropper
  private readonly videoCropper: VideoCropper
  private readonly resolveFfmpeg: () => string
  private readonly detectEncoder: (ffmpegPath: string) => Promise<string | null>
  private readonly launch?: ProcessLauncher
  private readonly exists: PathExists

  constructor(options: CropExecutorOptions = {}) {
    this.config = options.config ?? loadCropConfig()
    this.probe = options.probe ?? createMediaProbe({ config: this.config, launch: options.launch })
    this.imageCropper =
      options.imageCropper ?? new FfmpegImageCropper({ config: this.config, launch: options.launch })
    this.videoCropper = options.videoCropper ?? cropVideo
    this.resolveFfmpeg = options.resolveFfmpeg ?? (() => resolveFfmpegPath(this.config))
    this.detectEncoder =
      options.detectEncoder ??
      ((ffmpegPath) => detectHardwareEncoder(ffmpegPath, { launch: options.launch }))
    this.launch = options.launch
    this.exists = options.exists ?? pathExists
  }

  /**
   * Run a batch. Throws InvalidCropRegionError before anything runs when the region does not
   * fit the reference; every per-file problem ends up in the summary instead.
   */
  async run(request: CropBatchRequest): Promise<BatchSummary> {
    const region: Readonly<CropRect> = Object.freeze({ ...request.region })
    validateCropRegion(region, request.reference)

    const post = (message: BatchMessage) => request.channel?.post(message)
    const { signal } = request
    const results: JobResult[] = []
    const skipped: JobResult[] = []
    const planned: PlannedJob[] = []

    const candidates =
      request.scope === 'reference-only' ? [request.reference.path] : Array.from(new Set(request.candidates))

    for (const sourcePath of candidates) {
      let item: MediaItem
      try {
        item = { ...(await this.probe(sourcePath)), path: sourcePath }
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error)
        log.warn(`Skipping unreadable ${sourcePath}: ${reason}`)
        skipped.push({ sourcePath, kind: null, outputPath: null, status: 'skipped-unreadable', reason, code: 'unreadable-media' })
        continue
      }

      if (!hasSameDimensions(item, request.reference)) {
        log.info(`Skipping ${sourcePath}: ${item.width}x${item.height} differs from the reference`)
        skipped.push({
          sourcePath,
          kind: item.kind,
          outputPath: null,
          status: 'skipped-for-size',
          reason: `${item.width}x${item.height} does not match ${request.reference.width}x${request.reference.height}`,
        })
        continue
      }

      planned.push({ sourcePath, kind: item.kind, region, duration: item.duration })
    }

    const ordered = [
      ...planned.filter(job => job.kind === 'image'),
      ...planned.filter(job => job.kind === 'video'),
    ]
    const totalJobs = ordered.length

    post({ type: 'batch-started', totalJobs, skipped: skipped.length })
    for (const result of skipped) {
      results.push(result)
      post({ type: 'job-completed', jobIndex: null, totalJobs, result })
    }

    let jobIndex = 0
    try {
      await mkdir(request.outputDir, { recursive: true })

      const hasVideo = ordered.some(job => job.kind === 'video')
      const tooling = hasVideo && !signal?.aborted ? await this.prepareVideoTooling() : null
      if (tooling && 'error' in tooling && this.imageCropper instanceof FfmpegImageCropper && ordered[0]?.kind === 'image') {
        log.warn('Image jobs use the ffmpeg cropper and will fail as well')
      }

      const reserved = new Set<string>()
      for (; jobIndex < totalJobs; jobIndex++) {
        const job = ordered[jobIndex]
        const result = await this.runJob(job, jobIndex, totalJobs, request.outputDir, reserved, tooling, post, signal)
        results.push(result)
        post({ type: 'job-completed', jobIndex, totalJobs, result })
      }
    } catch (error) {
      // Jobs not yet reported are failed with the cause; the summary still goes out.
      const reason = error instanceof Error ? error.message : String(error)
      log.error('Batch interrupted:', reason)
      for (; jobIndex < totalJobs; jobIndex++) {
        const job = ordered[jobIndex]
        const result: JobResult = {
          sourcePath: job.sourcePath,
          kind: job.kind,
          outputPath: null,
          status: 'failed',
          reason,
          ...(isCropError(error) ? { code: error.code } : {}),
        }
        results.push(result)
        post({ type: 'job-completed', jobIndex, totalJobs, result })
      }
    }

    const summary = summarizeJobs(results)
    log.info(
      `Batch done: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.cancelled} cancelled, ` +
        `${summary.skippedForSize + summary.skippedUnreadable} skipped`
    )
    post({ type: 'batch-completed', summary })
    return summary
  }

  private async prepareVideoTooling(): Promise<VideoTooling> {
    let ffmpegPath: string
    try {
      ffmpegPath = this.resolveFfmpeg()
    } catch (error) {
      if (!isCropError(error)) throw error
      log.error('Video jobs refused:', error.message)
      return { error }
    }
    const encoder = this.config.hardwareEncode === 'auto' ? await this.detectEncoder(ffmpegPath) : null
    return { ffmpegPath, encoder }
  }

  private async runJob(
    job: PlannedJob,
    jobIndex: number,
    totalJobs: number,
    outputDir: string,
    reserved: Set<string>,
    tooling: VideoTooling | null,
    post: (message: BatchMessage) => void,
    signal?: AbortSignal
  ): Promise<JobResult> {
    const cancelled: JobResult = { sourcePath: job.sourcePath, kind: job.kind, outputPath: null, status: 'cancelled' }
    if (signal?.aborted) return cancelled

    if (job.kind === 'video' && tooling && 'error' in tooling) {
      return {
        sourcePath: job.sourcePath,
        kind: job.kind,
        outputPath: null,
        status: 'failed',
        reason: tooling.error.message,
        code: tooling.error.code,
      }
    }

    const outputPath = await resolveOutputPath(job.sourcePath, outputDir, reserved, this.exists)
    const onProgress = (percent: number | null) =>
      post({ type: 'progress', sourcePath: job.sourcePath, jobIndex, totalJobs, percent })

    try {
      const outcome = await this.startJob(job, outputPath, tooling, onProgress, signal)
      return outcomeToResult(job, outputPath, outcome)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      log.error(`${job.sourcePath} failed:`, reason)
      return {
        sourcePath: job.sourcePath,
        kind: job.kind,
        outputPath: null,
        status: 'failed',
        reason,
        ...(isCropError(error) ? { code: error.code } : {}),
      }
    }
  }

  private startJob(
    job: PlannedJob,
    outputPath: string,
    tooling: VideoTooling | null,
    onProgress: (percent: number | null) => void,
    signal?: AbortSignal
  ): Promise<JobOutcome> {
    if (job.kind === 'image') {
      onProgress(0)
      return this.imageCropper.crop({ inputPath: job.sourcePath, outputPath, region: job.region, signal })
    }

    if (!tooling || 'error' in tooling) {
      throw new Error(`No ffmpeg available for ${job.sourcePath}`)
    }
    return this.videoCropper({
      ffmpegPath: tooling.ffmpegPath,
      inputPath: job.sourcePath,
      outputPath,
      region: job.region,
      encoder: tooling.encoder,
      durationSeconds: job.duration ?? null,
      signal,
      onProgress,
      config: this.config,
      launch: this.launch,
    })
  }
}
