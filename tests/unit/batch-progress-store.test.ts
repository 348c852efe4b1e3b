import { createBatchProgressStore, createStoreChannel, getOverallPercent } from '@/stores/batch-progress-store'
import type { JobResult } from '@/types/batch'

const skipped: JobResult = {
  sourcePath: 'small.png',
  kind: 'image',
  outputPath: null,
  status: 'skipped-for-size',
  reason: '640x480 does not match 800x600',
}

const done: JobResult = {
  sourcePath: 'clip.mp4',
  kind: 'video',
  outputPath: '/out/clip_cropped.mp4',
  status: 'succeeded',
}

describe('batch progress store', () => {
  it('folds batch messages into a snapshot', () => {
    const store = createBatchProgressStore()
    const channel = createStoreChannel(store)

    channel.post({ type: 'batch-started', totalJobs: 2, skipped: 1 })
    expect(store.getState().status).toBe('running')

    channel.post({ type: 'job-completed', jobIndex: null, totalJobs: 2, result: skipped })
    expect(store.getState().completedJobs).toBe(0)
    expect(store.getState().results).toEqual([skipped])

    channel.post({ type: 'progress', sourcePath: 'clip.mp4', jobIndex: 0, totalJobs: 2, percent: 50 })
    expect(store.getState().currentPercent).toBe(50)
    expect(getOverallPercent(store.getState())).toBe(25)

    channel.post({ type: 'job-completed', jobIndex: 0, totalJobs: 2, result: done })
    expect(store.getState().completedJobs).toBe(1)
    expect(getOverallPercent(store.getState())).toBe(50)

    channel.post({ type: 'progress', sourcePath: 'other.mp4', jobIndex: 1, totalJobs: 2, percent: null })
    expect(store.getState().currentPercent).toBeNull()
    expect(getOverallPercent(store.getState())).toBe(50)

    const summary = { succeeded: 1, skippedForSize: 1, skippedUnreadable: 0, failed: 0, cancelled: 1, jobs: [] }
    channel.post({ type: 'batch-completed', summary })
    expect(store.getState().status).toBe('completed')
    expect(store.getState().summary).toEqual(summary)
    expect(getOverallPercent(store.getState())).toBe(100)
  })

  it('notifies subscribers with a new snapshot per message', () => {
    const store = createBatchProgressStore()
    const snapshots: number[] = []
    const unsubscribe = store.subscribe((state) => snapshots.push(state.totalJobs))

    const before = store.getState()
    store.getState().apply({ type: 'batch-started', totalJobs: 3, skipped: 0 })
    unsubscribe()
    store.getState().reset()

    expect(snapshots).toEqual([3])
    expect(before.totalJobs).toBe(0)
    expect(store.getState().status).toBe('idle')
  })

  it('starts fresh on a new batch', () => {
    const store = createBatchProgressStore()
    store.getState().apply({ type: 'batch-started', totalJobs: 1, skipped: 0 })
    store.getState().apply({ type: 'job-completed', jobIndex: 0, totalJobs: 1, result: done })

    store.getState().apply({ type: 'batch-started', totalJobs: 4, skipped: 2 })
    expect(store.getState().results).toEqual([])
    expect(store.getState().completedJobs).toBe(0)
    expect(store.getState().skipped).toBe(2)
  })
})
