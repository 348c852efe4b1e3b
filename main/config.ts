export type HardwareEncodeMode = 'auto' | 'off'

export interface CropConfig {
  /** Overrides the bundled ffmpeg binary */
  ffmpegPath: string | null
  /** Overrides the bundled ffprobe binary */
  ffprobePath: string | null
  hardwareEncode: HardwareEncodeMode
  /** How often a running transcode checks for cancellation */
  pollIntervalMs: number
  /** Time between SIGTERM and SIGKILL */
  gracePeriodMs: number
  probeTimeoutMs: number
}

export const MAX_POLL_INTERVAL_MS = 100

export const DEFAULT_CROP_CONFIG: Readonly<CropConfig> = Object.freeze({
  ffmpegPath: null,
  ffprobePath: null,
  hardwareEncode: 'auto',
  pollIntervalMs: 100,
  gracePeriodMs: 2000,
  probeTimeoutMs: 5000,
})

function readPositiveInt(value: string | undefined): number | null {
  const parsed = Number.parseInt(value || '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null
}

function readPath(value: string | undefined): string | null {
  const trimmed = value?.trim()
  return trimmed ? trimmed : null
}

export function loadCropConfig(env: NodeJS.ProcessEnv = process.env): CropConfig {
  const pollIntervalMs = readPositiveInt(env.BATCH_CROP_POLL_INTERVAL_MS) || DEFAULT_CROP_CONFIG.pollIntervalMs

  return {
    ffmpegPath: readPath(env.BATCH_CROP_FFMPEG_PATH),
    ffprobePath: readPath(env.BATCH_CROP_FFPROBE_PATH),
    hardwareEncode: env.BATCH_CROP_HW_ENCODE?.trim().toLowerCase() === 'off' ? 'off' : 'auto',
    pollIntervalMs: Math.min(pollIntervalMs, MAX_POLL_INTERVAL_MS),
    gracePeriodMs: readPositiveInt(env.BATCH_CROP_GRACE_PERIOD_MS) || DEFAULT_CROP_CONFIG.gracePeriodMs,
    probeTimeoutMs: readPositiveInt(env.BATCH_CROP_PROBE_TIMEOUT_MS) || DEFAULT_CROP_CONFIG.probeTimeoutMs,
  }
}
