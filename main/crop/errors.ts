import type { CropErrorCode } from '../../src/types/batch'

export abstract class CropError extends Error {
  abstract readonly code: CropErrorCode
}

/** The file could not be decoded as an image or video. */
export class UnreadableMediaError extends CropError {
  readonly code = 'unreadable-media' as const

  constructor(readonly path: string, detail?: string) {
    super(detail ? `Cannot read media ${path}: ${detail}` : `Cannot read media ${path}`)
    this.name = 'UnreadableMediaError'
  }
}

export class ExternalToolMissingError extends CropError {
  readonly code = 'external-tool-missing' as const

  constructor(readonly tool: 'ffmpeg' | 'ffprobe', detail?: string) {
    super(detail ? `${tool} not found: ${detail}` : `${tool} not found`)
    this.name = 'ExternalToolMissingError'
  }
}

export class ProcessLaunchError extends CropError {
  readonly code = 'process-launch-failed' as const

  constructor(readonly command: string, cause?: unknown) {
    super(`Failed to launch ${command}${cause instanceof Error ? `: ${cause.message}` : ''}`)
    this.name = 'ProcessLaunchError'
  }
}

export class ProcessExitError extends CropError {
  readonly code = 'process-exit' as const

  constructor(
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null,
    readonly stderrTail: string
  ) {
    const how = exitCode !== null ? `code ${exitCode}` : `signal ${signal ?? 'unknown'}`
    super(stderrTail ? `Process exited with ${how}: ${stderrTail}` : `Process exited with ${how}`)
    this.name = 'ProcessExitError'
  }
}

/** The committed rectangle does not fit the reference item. */
export class InvalidCropRegionError extends CropError {
  readonly code = 'invalid-crop-region' as const

  constructor(message: string) {
    super(message)
    this.name = 'InvalidCropRegionError'
  }
}

export function isCropError(error: unknown): error is CropError {
  return error instanceof CropError
}
