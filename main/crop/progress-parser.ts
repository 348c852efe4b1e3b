import { clamp } from '../../src/shared/utils/math'

const TIME_PATTERN = /time=(\d+):(\d+):(\d+\.\d+)/

/** Elapsed output time in seconds from one ffmpeg status line, or null. */
export function parseProgressTime(line: string): number | null {
  const match = line.match(TIME_PATTERN)
  if (!match) return null
  const hours = Number.parseInt(match[1], 10)
  const minutes = Number.parseInt(match[2], 10)
  const seconds = Number.parseFloat(match[3])
  return hours * 3600 + minutes * 60 + seconds
}

/** null when the duration is unknown; progress is then indeterminate. */
export function computePercent(elapsedSeconds: number, durationSeconds: number | null | undefined): number | null {
  if (durationSeconds == null || !Number.isFinite(durationSeconds) || durationSeconds <= 0) return null
  return clamp((elapsedSeconds / durationSeconds) * 100, 0, 100)
}

/**
 * Splits a chunked stream into lines. ffmpeg rewrites its status line with bare `\r`, so
 * both `\r` and `\n` end a line.
 */
export class LineSplitter {
  private pending = ''

  push(chunk: string): string[] {
    const parts = (this.pending + chunk).split(/\r\n|\r|\n/)
    this.pending = parts.pop() ?? ''
    return parts.filter(line => line.length > 0)
  }

  flush(): string[] {
    const rest = this.pending
    this.pending = ''
    return rest.length > 0 ? [rest] : []
  }
}

/** Keeps the last few lines of a stream for error messages. */
export class LineTail {
  private lines: string[] = []

  constructor(private readonly limit = 5) {}

  add(line: string): void {
    this.lines.push(line)
    if (this.lines.length > this.limit) this.lines.shift()
  }

  toString(): string {
    return this.lines.join('\n')
  }
}
