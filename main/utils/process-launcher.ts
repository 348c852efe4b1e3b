import { spawn } from 'child_process'
import * as path from 'path'
import type { Readable } from 'stream'

/** The slice of a child process the crop pipeline relies on. */
export interface LaunchedProcess {
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  kill(signal?: NodeJS.Signals): boolean
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this
  once(event: 'error', listener: (error: Error) => void): this
}

export interface LaunchOptions {
  env: NodeJS.ProcessEnv
}

export type ProcessLauncher = (command: string, args: string[], options: LaunchOptions) => LaunchedProcess

export const spawnProcess: ProcessLauncher = (command, args, options) =>
  spawn(command, args, { env: options.env, stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true })

/**
 * Minimal environment for ffmpeg/ffprobe: nothing from the parent process leaks into the
 * child except the search path and the binary's own library directory.
 */
export function createChildEnv(binaryPath: string, parentEnv: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const binaryDir = path.dirname(binaryPath)
  return {
    PATH: parentEnv.PATH || '/usr/bin:/bin:/usr/sbin:/sbin',
    DYLD_LIBRARY_PATH: `${binaryDir}:${parentEnv.DYLD_LIBRARY_PATH || ''}`,
    LD_LIBRARY_PATH: `${binaryDir}:${parentEnv.LD_LIBRARY_PATH || ''}`,
  }
}
