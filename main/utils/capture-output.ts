import { ProcessLaunchError } from '../crop/errors'
import type { LaunchedProcess, ProcessLauncher } from './process-launcher'
import { spawnProcess } from './process-launcher'

export interface CapturedOutput {
  exitCode: number | null
  stdout: string
  stderr: string
  timedOut: boolean
}

export interface CaptureOptions {
  env: NodeJS.ProcessEnv
  timeoutMs: number
  launch?: ProcessLauncher
}

/** Run a short-lived command and collect its output. Rejects only when it cannot start. */
export function captureOutput(command: string, args: string[], options: CaptureOptions): Promise<CapturedOutput> {
  const launch = options.launch ?? spawnProcess

  return new Promise((resolve, reject) => {
    let stdout = ''
    let stderr = ''
    let timedOut = false
    let settled = false

    let proc: LaunchedProcess
    try {
      proc = launch(command, args, { env: options.env })
    } catch (error) {
      reject(new ProcessLaunchError(command, error))
      return
    }

    const timeout = setTimeout(() => {
      timedOut = true
      proc.kill('SIGKILL')
    }, options.timeoutMs)
    timeout.unref?.()

    proc.stdout?.on('data', (data: Buffer | string) => {
      stdout += data.toString()
    })
    proc.stderr?.on('data', (data: Buffer | string) => {
      stderr += data.toString()
    })

    proc.once('exit', (code) => {
      if (settled) return
      settled = true
      clearTimeout(timeout)
      resolve({ exitCode: code, stdout, stderr, timedOut })
    })

    proc.once('error', (error) => {
      if (settled) return
      settled = true
      clearTimeout(timeout)
      reject(new ProcessLaunchError(command, error))
    })
  })
}
