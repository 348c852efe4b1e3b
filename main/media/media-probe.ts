/**
 * ffprobe-backed media probe. Dimensions come from the first video stream; the kind is
 * decided by extension, then by the container ffprobe reports.
 */

import * as path from 'path'
import type { MediaKind, MediaProbe, MediaProbeResult } from '../../src/types/media'
import type { CropConfig } from '../config'
import { loadCropConfig } from '../config'
import { UnreadableMediaError } from '../crop/errors'
import { captureOutput } from '../utils/capture-output'
import { resolveFfprobePath } from '../utils/ffmpeg-resolver'
import { logger } from '../utils/logger'
import type { ProcessLauncher } from '../utils/process-launcher'
import { createChildEnv } from '../utils/process-launcher'

const log = logger.child('MediaProbe')

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png', '.jpg', '.jpeg', '.bmp', '.gif', '.tif', '.tiff', '.webp',
])

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4', '.mov', '.m4v', '.avi', '.mkv', '.webm', '.wmv', '.flv', '.mpg', '.mpeg',
])

/** Demuxers ffprobe uses for single still images */
const IMAGE_FORMAT_PATTERN = /(^|,)(image2|[a-z0-9]+_pipe)(,|$)/

export function kindFromExtension(filePath: string): MediaKind | null {
  const ext = path.extname(filePath).toLowerCase()
  if (IMAGE_EXTENSIONS.has(ext)) return 'image'
  if (VIDEO_EXTENSIONS.has(ext)) return 'video'
  return null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readPositiveInt(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : null
}

function readDuration(value: unknown): number | null {
  const seconds = typeof value === 'string' ? Number.parseFloat(value) : typeof value === 'number' ? value : NaN
  return Number.isFinite(seconds) && seconds > 0 ? seconds : null
}

/**
 * Parse `ffprobe -of json` output. Throws UnreadableMediaError when there is no video stream
 * with usable dimensions.
 */
export function parseProbeOutput(json: string, filePath: string): MediaProbeResult {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch {
    throw new UnreadableMediaError(filePath, 'ffprobe returned invalid JSON')
  }
  if (!isRecord(parsed)) throw new UnreadableMediaError(filePath, 'ffprobe returned no data')

  const streams = Array.isArray(parsed.streams) ? parsed.streams : []
  const stream: unknown = streams[0]
  const width = isRecord(stream) ? readPositiveInt(stream.width) : null
  const height = isRecord(stream) ? readPositiveInt(stream.height) : null
  if (width === null || height === null) {
    throw new UnreadableMediaError(filePath, 'no video stream')
  }

  const format = isRecord(parsed.format) ? parsed.format : {}
  const formatName = typeof format.format_name === 'string' ? format.format_name : ''
  const kind = kindFromExtension(filePath) ?? (IMAGE_FORMAT_PATTERN.test(formatName) ? 'image' : 'video')

  if (kind === 'image') {
    return { width, height, kind }
  }
  const duration = readDuration(format.duration)
  return duration === null ? { width, height, kind } : { width, height, kind, duration }
}

export interface MediaProbeOptions {
  config?: CropConfig
  /** Resolved lazily from the config when absent */
  ffprobePath?: string
  launch?: ProcessLauncher
}

export function createMediaProbe(options: MediaProbeOptions = {}): MediaProbe {
  const config = options.config ?? loadCropConfig()
  let ffprobePath = options.ffprobePath ?? null

  return async (filePath) => {
    ffprobePath ??= resolveFfprobePath(config)

    const output = await captureOutput(
      ffprobePath,
      [
        '-v', 'error',
        '-select_streams', 'v:0',
        '-show_entries', 'stream=width,height:format=duration,format_name',
        '-of', 'json',
        filePath,
      ],
      { env: createChildEnv(ffprobePath), timeoutMs: config.probeTimeoutMs, launch: options.launch }
    )

    if (output.timedOut) {
      throw new UnreadableMediaError(filePath, `ffprobe timed out after ${config.probeTimeoutMs}ms`)
    }
    if (output.exitCode !== 0) {
      log.debug(`ffprobe failed for ${filePath}:`, output.stderr.trim())
      throw new UnreadableMediaError(filePath, output.stderr.trim() || `ffprobe exited with code ${output.exitCode}`)
    }
    return parseProbeOutput(output.stdout, filePath)
  }
}

let defaultProbe: MediaProbe | null = null

export const probeMedia: MediaProbe = (filePath) => {
  defaultProbe ??= createMediaProbe()
  return defaultProbe(filePath)
}

/** Duration in seconds, or null when it cannot be determined. */
export async function getMediaDuration(filePath: string, probe: MediaProbe = probeMedia): Promise<number | null> {
  try {
    const result = await probe(filePath)
    return result.duration ?? null
  } catch (error) {
    log.warn(`Duration unavailable for ${filePath}:`, error instanceof Error ? error.message : error)
    return null
  }
}
