/**
 * Runs one external process to completion with progress extraction, cooperative
 * cancellation and cleanup of the partial output file.
 *
 *   not-started -> running -> completed
 *                          -> failed
 *                          -> cancelling -> cancelled
 *
 * Two activities run side by side while the process is alive: the stderr listener that
 * turns `time=` lines into progress, and the poll timer that watches for cancellation.
 */

import { rm } from 'fs/promises'
import type { CropErrorCode } from '../../src/types/batch'
import { DEFAULT_CROP_CONFIG, MAX_POLL_INTERVAL_MS } from '../config'
import type { LaunchedProcess, ProcessLauncher } from '../utils/process-launcher'
import { spawnProcess } from '../utils/process-launcher'
import { logger as rootLogger } from '../utils/logger'
import type { Logger } from '../utils/logger'
import type { CropError } from './errors'
import { ProcessExitError, ProcessLaunchError } from './errors'
import { LineSplitter, LineTail, computePercent, parseProgressTime } from './progress-parser'

export type SupervisorStatus = 'not-started' | 'running' | 'completed' | 'cancelling' | 'cancelled' | 'failed'

export type JobOutcome =
  | { status: 'success' }
  | { status: 'cancelled' }
  | { status: 'failed'; reason: string; code: CropErrorCode; error: CropError }

export interface ProcessSupervisorOptions {
  command: string
  args: string[]
  env?: NodeJS.ProcessEnv
  /** Removed when the process does not finish successfully */
  outputPath?: string
  signal?: AbortSignal
  /** Source duration in seconds; null or absent makes progress indeterminate */
  durationSeconds?: number | null
  onProgress?: (percent: number | null) => void
  pollIntervalMs?: number
  gracePeriodMs?: number
  launch?: ProcessLauncher
  logger?: Logger
}

export function failedOutcome(error: CropError): JobOutcome {
  return { status: 'failed', reason: error.message, code: error.code, error }
}

export class ProcessSupervisor {
  private status: SupervisorStatus = 'not-started'
  private readonly options: ProcessSupervisorOptions
  private readonly log: Logger
  private cancelRequested = false

  constructor(options: ProcessSupervisorOptions) {
    this.options = options
    this.log = options.logger ?? rootLogger.child('ProcessSupervisor')
  }

  getStatus(): SupervisorStatus {
    return this.status
  }

  /** Request cancellation independently of the abort signal. */
  cancel(): void {
    this.cancelRequested = true
  }

  async run(): Promise<JobOutcome> {
    if (this.status !== 'not-started') {
      throw new Error(`ProcessSupervisor is single-use (status: ${this.status})`)
    }

    if (this.isCancelRequested()) {
      this.status = 'cancelled'
      return { status: 'cancelled' }
    }

    const outcome = await this.supervise()
    if (outcome.status !== 'success') {
      await this.removePartialOutput()
    }
    return outcome
  }

  private isCancelRequested(): boolean {
    return this.cancelRequested || this.options.signal?.aborted === true
  }

  private supervise(): Promise<JobOutcome> {
    const { command, args, durationSeconds, onProgress } = this.options
    const launch = this.options.launch ?? spawnProcess
    const pollIntervalMs = Math.min(
      this.options.pollIntervalMs ?? DEFAULT_CROP_CONFIG.pollIntervalMs,
      MAX_POLL_INTERVAL_MS
    )
    const gracePeriodMs = this.options.gracePeriodMs ?? DEFAULT_CROP_CONFIG.gracePeriodMs

    return new Promise<JobOutcome>((resolve) => {
      let proc: LaunchedProcess
      try {
        proc = launch(command, args, { env: this.options.env ?? {} })
      } catch (error) {
        this.status = 'failed'
        resolve(failedOutcome(new ProcessLaunchError(command, error)))
        return
      }

      this.status = 'running'
      this.log.debug(`Started ${command} ${args.join(' ')}`)

      const splitter = new LineSplitter()
      const tail = new LineTail()
      let killTimer: NodeJS.Timeout | null = null
      let settled = false

      const handleLine = (line: string) => {
        tail.add(line)
        const elapsed = parseProgressTime(line)
        if (elapsed !== null) {
          onProgress?.(computePercent(elapsed, durationSeconds))
        }
      }

      proc.stderr?.on('data', (data: Buffer | string) => {
        for (const line of splitter.push(data.toString())) handleLine(line)
      })

      const pollTimer = setInterval(() => {
        if (this.status !== 'running' || !this.isCancelRequested()) return
        this.status = 'cancelling'
        this.log.info(`Cancelling ${command}`)
        proc.kill('SIGTERM')
        killTimer = setTimeout(() => {
          if (settled) return
          this.log.warn(`${command} ignored SIGTERM for ${gracePeriodMs}ms, sending SIGKILL`)
          proc.kill('SIGKILL')
        }, gracePeriodMs)
        killTimer.unref?.()
      }, pollIntervalMs)

      const settle = (outcome: JobOutcome, status: SupervisorStatus) => {
        if (settled) return
        settled = true
        clearInterval(pollTimer)
        if (killTimer) clearTimeout(killTimer)
        this.status = status
        resolve(outcome)
      }

      proc.once('exit', (code, signal) => {
        for (const line of splitter.flush()) handleLine(line)

        if (this.status === 'cancelling') {
          settle({ status: 'cancelled' }, 'cancelled')
        } else if (code === 0) {
          settle({ status: 'success' }, 'completed')
        } else {
          this.log.error(`${command} exited with code ${code} signal ${signal}`)
          settle(failedOutcome(new ProcessExitError(code, signal, tail.toString())), 'failed')
        }
      })

      proc.once('error', (error) => {
        this.log.error(`Failed to run ${command}:`, error.message)
        settle(failedOutcome(new ProcessLaunchError(command, error)), 'failed')
      })
    })
  }

  private async removePartialOutput(): Promise<void> {
    const { outputPath } = this.options
    if (!outputPath) return
    try {
      await rm(outputPath, { force: true })
    } catch (error) {
      this.log.warn(`Could not remove partial output ${outputPath}:`, error instanceof Error ? error.message : error)
    }
  }
}
