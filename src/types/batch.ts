import type { CropRect } from './crop'
import type { MediaItem, MediaKind } from './media'

export type CropErrorCode =
  | 'unreadable-media'
  | 'external-tool-missing'
  | 'process-launch-failed'
  | 'process-exit'
  | 'invalid-crop-region'

export type JobStatus =
  | 'succeeded'
  | 'failed'
  | 'cancelled'
  | 'skipped-for-size'
  | 'skipped-unreadable'

export interface JobResult {
  sourcePath: string
  /** null when the file could not be probed */
  kind: MediaKind | null
  /** Only set for jobs that produced a file */
  outputPath: string | null
  status: JobStatus
  reason?: string
  code?: CropErrorCode
}

export interface BatchSummary {
  succeeded: number
  skippedForSize: number
  skippedUnreadable: number
  failed: number
  cancelled: number
  jobs: JobResult[]
}

export type BatchScope = 'matching' | 'reference-only'

export interface CropJob {
  sourcePath: string
  kind: MediaKind
  region: Readonly<CropRect>
  outputPath: string
}

export interface BatchStarted {
  type: 'batch-started'
  /** Jobs that will run (eligible files) */
  totalJobs: number
  /** Files excluded before any job ran */
  skipped: number
}

export interface ProgressUpdate {
  type: 'progress'
  sourcePath: string
  jobIndex: number
  totalJobs: number
  /** 0-100, or null while the duration is unknown */
  percent: number | null
}

export interface JobCompleted {
  type: 'job-completed'
  jobIndex: number | null
  totalJobs: number
  result: JobResult
}

export interface BatchCompleted {
  type: 'batch-completed'
  summary: BatchSummary
}

export type BatchMessage = BatchStarted | ProgressUpdate | JobCompleted | BatchCompleted

/** One-way producer -> consumer link between the batch pipeline and whoever displays it. */
export interface BatchChannel {
  post(message: BatchMessage): void
}

export interface CropBatchRequest {
  region: Readonly<CropRect>
  reference: MediaItem
  candidates: string[]
  outputDir: string
  signal?: AbortSignal
  channel?: BatchChannel
  scope?: BatchScope
}
