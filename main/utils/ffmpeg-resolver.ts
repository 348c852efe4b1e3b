/**
 * FFmpeg/FFprobe binary resolver.
 * A configured path wins; otherwise the static binaries from @ffmpeg-installer/ffmpeg and
 * @ffprobe-installer/ffprobe are used.
 */

import * as fs from 'fs'
import type { CropConfig } from '../config'
import { loadCropConfig } from '../config'
import { ExternalToolMissingError } from '../crop/errors'
import { logger } from './logger'

const log = logger.child('FFmpeg Resolver')

function readInstallerPath(installer: unknown): string | null {
  if (typeof installer !== 'object' || installer === null || !('path' in installer)) return null
  return typeof installer.path === 'string' ? installer.path : null
}

function loadInstaller(tool: 'ffmpeg' | 'ffprobe'): string | null {
  try {
    const installer: unknown =
      tool === 'ffmpeg' ? require('@ffmpeg-installer/ffmpeg') : require('@ffprobe-installer/ffprobe')
    return readInstallerPath(installer)
  } catch (error) {
    log.warn(`${tool} installer package unavailable:`, error instanceof Error ? error.message : error)
    return null
  }
}

function resolveTool(tool: 'ffmpeg' | 'ffprobe', override: string | null): string {
  if (override) {
    if (fs.existsSync(override)) {
      log.debug(`Using configured ${tool}: ${override}`)
      return override
    }
    throw new ExternalToolMissingError(tool, `configured path ${override} does not exist`)
  }

  const bundled = loadInstaller(tool)
  if (bundled && fs.existsSync(bundled)) {
    log.debug(`Using @${tool}-installer binary: ${bundled}`)
    return bundled
  }

  throw new ExternalToolMissingError(tool, `ensure @${tool}-installer/${tool} is installed`)
}

export function resolveFfmpegPath(config: CropConfig = loadCropConfig()): string {
  return resolveTool('ffmpeg', config.ffmpegPath)
}

export function resolveFfprobePath(config: CropConfig = loadCropConfig()): string {
  return resolveTool('ffprobe', config.ffprobePath)
}
