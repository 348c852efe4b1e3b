function isDebugEnabled(): boolean {
  return process.env.NODE_ENV === 'development' || process.env.BATCH_CROP_DEBUG === '1'
}

export class Logger {
  private isDev = isDebugEnabled()

  constructor(private readonly scope?: string) {}

  /** Logger whose lines carry a `[Scope]` prefix. */
  child(scope: string): Logger {
    return new Logger(scope)
  }

  debug(...args: unknown[]): void {
    if (this.isDev) {
      console.debug('[DEBUG]', ...this.prefix(args))
    }
  }

  info(...args: unknown[]): void {
    console.info('[INFO]', ...this.prefix(args))
  }

  warn(...args: unknown[]): void {
    console.warn('[WARN]', ...this.prefix(args))
  }

  error(...args: unknown[]): void {
    console.error('[ERROR]', ...this.prefix(args))
  }

  private prefix(args: unknown[]): unknown[] {
    return this.scope ? [`[${this.scope}]`, ...args] : args
  }
}

export const logger = new Logger()
