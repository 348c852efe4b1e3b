import { captureOutput } from '../utils/capture-output'
import { logger } from '../utils/logger'
import type { ProcessLauncher } from '../utils/process-launcher'
import { createChildEnv } from '../utils/process-launcher'

const log = logger.child('HwEncoder')

/** In order of preference */
export const HARDWARE_ENCODERS = ['h264_videotoolbox', 'h264_nvenc', 'h264_qsv', 'h264_amf'] as const

export type HardwareEncoder = (typeof HARDWARE_ENCODERS)[number]

/** Encoder names from `ffmpeg -encoders` output (lines like ` V....D h264_nvenc  NVIDIA ...`). */
export function parseEncoderNames(listing: string): Set<string> {
  const names = new Set<string>()
  for (const line of listing.split(/\r?\n/)) {
    const match = line.match(/^\s*[A-Z.]{6}\s+(\S+)/)
    if (match) names.add(match[1])
  }
  return names
}

export function pickHardwareEncoder(listing: string): HardwareEncoder | null {
  const names = parseEncoderNames(listing)
  return HARDWARE_ENCODERS.find(name => names.has(name)) ?? null
}

export interface DetectEncoderOptions {
  timeoutMs?: number
  launch?: ProcessLauncher
}

/** Probe once per batch; any failure means software encoding. */
export async function detectHardwareEncoder(
  ffmpegPath: string,
  options: DetectEncoderOptions = {}
): Promise<HardwareEncoder | null> {
  try {
    const output = await captureOutput(ffmpegPath, ['-hide_banner', '-encoders'], {
      env: createChildEnv(ffmpegPath),
      timeoutMs: options.timeoutMs ?? 5000,
      launch: options.launch,
    })
    if (output.exitCode !== 0) return null
    const encoder = pickHardwareEncoder(output.stdout)
    log.info(encoder ? `Hardware encoder: ${encoder}` : 'No hardware encoder, using software encoding')
    return encoder
  } catch (error) {
    log.warn('Encoder probe failed:', error instanceof Error ? error.message : error)
    return null
  }
}
