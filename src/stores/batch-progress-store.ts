/**
 * Display-side view of a running batch. The pipeline never touches this store directly; it
 * posts BatchMessages through a channel and the store folds them into a snapshot.
 */

import { createStore } from 'zustand/vanilla'
import { immer } from 'zustand/middleware/immer'
import type { BatchChannel, BatchMessage, BatchSummary, JobResult } from '../types/batch'

export type BatchRunStatus = 'idle' | 'running' | 'completed'

export interface BatchProgressState {
  status: BatchRunStatus
  totalJobs: number
  skipped: number
  completedJobs: number
  currentPath: string | null
  /** null while the current job's duration is unknown */
  currentPercent: number | null
  results: JobResult[]
  summary: BatchSummary | null
}

interface BatchProgressActions {
  apply: (message: BatchMessage) => void
  reset: () => void
}

export type BatchProgressStore = BatchProgressState & BatchProgressActions

function createInitialState(): BatchProgressState {
  return {
    status: 'idle',
    totalJobs: 0,
    skipped: 0,
    completedJobs: 0,
    currentPath: null,
    currentPercent: null,
    results: [],
    summary: null,
  }
}

export function createBatchProgressStore() {
  return createStore<BatchProgressStore>()(
    immer((set) => ({
      ...createInitialState(),

      apply: (message) => {
        set((state) => {
          switch (message.type) {
            case 'batch-started':
              Object.assign(state, createInitialState())
              state.status = 'running'
              state.totalJobs = message.totalJobs
              state.skipped = message.skipped
              break
            case 'progress':
              state.currentPath = message.sourcePath
              state.currentPercent = message.percent
              break
            case 'job-completed':
              state.results.push(message.result)
              if (message.jobIndex !== null) {
                state.completedJobs += 1
                state.currentPath = null
                state.currentPercent = null
              }
              break
            case 'batch-completed':
              state.status = 'completed'
              state.summary = message.summary
              state.currentPath = null
              state.currentPercent = null
              break
          }
        })
      },

      reset: () => {
        set((state) => {
          Object.assign(state, createInitialState())
        })
      },
    }))
  )
}

export type BatchProgressStoreApi = ReturnType<typeof createBatchProgressStore>

/**
 * Whole-batch progress in percent. The running job contributes its own percent; an
 * indeterminate job contributes nothing until it completes.
 */
export function getOverallPercent(state: BatchProgressState): number {
  if (state.status === 'completed') return 100
  if (state.totalJobs === 0) return 0
  const current = state.currentPath !== null ? (state.currentPercent ?? 0) / 100 : 0
  return Math.min(100, ((state.completedJobs + current) / state.totalJobs) * 100)
}

/** Channel whose messages land in the given store. */
export function createStoreChannel(store: BatchProgressStoreApi): BatchChannel {
  return {
    post: (message) => store.getState().apply(message),
  }
}
