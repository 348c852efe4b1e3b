import { createMediaCatalogStore } from '@/stores/media-catalog-store'
import type { MediaProbe, MediaProbeResult } from '@/types/media'

const probed: Record<string, MediaProbeResult> = {
  'a.png': { width: 800, height: 600, kind: 'image' },
  'b.png': { width: 800, height: 600, kind: 'image' },
  'c.mp4': { width: 640, height: 480, kind: 'video', duration: 12 },
}

const probe: MediaProbe = async (path) => {
  const result = probed[path]
  if (!result) throw new Error('Invalid data found when processing input')
  return result
}

describe('media catalog store', () => {
  it('adds probed files and reports duplicates, unreadable files and size groups', async () => {
    const store = createMediaCatalogStore({ probe })

    const report = await store.getState().addFiles(['a.png', 'b.png', 'a.png', 'bad.mov', 'c.mp4'])

    expect(report.added.map(item => item.path)).toEqual(['a.png', 'b.png', 'c.mp4'])
    expect(report.duplicates).toEqual(['a.png'])
    expect(report.unreadable).toEqual([{ path: 'bad.mov', reason: 'Invalid data found when processing input' }])
    expect(report.dimensionGroups).toEqual([
      { key: '800x600', width: 800, height: 600, paths: ['a.png', 'b.png'] },
      { key: '640x480', width: 640, height: 480, paths: ['c.mp4'] },
    ])
    expect(store.getState().items[2]).toEqual({ path: 'c.mp4', width: 640, height: 480, kind: 'video', duration: 12 })
  })

  it('makes the first added item the reference', async () => {
    const store = createMediaCatalogStore({ probe })
    await store.getState().addFiles(['a.png', 'c.mp4', 'b.png'])

    expect(store.getState().referencePath).toBe('a.png')
    expect(store.getState().getEligibleItems().map(item => item.path)).toEqual(['a.png', 'b.png'])
  })

  it('treats files already in the catalog as duplicates', async () => {
    const store = createMediaCatalogStore({ probe })
    await store.getState().addFiles(['a.png'])

    const report = await store.getState().addFiles(['a.png', 'b.png'])
    expect(report.duplicates).toEqual(['a.png'])
    expect(store.getState().items.map(item => item.path)).toEqual(['a.png', 'b.png'])
  })

  it('switches the reference and the eligible set', async () => {
    const store = createMediaCatalogStore({ probe })
    await store.getState().addFiles(['a.png', 'b.png', 'c.mp4'])

    expect(store.getState().setReference('c.mp4')).toBe(true)
    expect(store.getState().getReferenceItem()?.path).toBe('c.mp4')
    expect(store.getState().getEligibleItems().map(item => item.path)).toEqual(['c.mp4'])

    expect(store.getState().setReference('missing.png')).toBe(false)
    expect(store.getState().referencePath).toBe('c.mp4')
  })

  it('moves the reference to the first item when the reference is removed', async () => {
    const store = createMediaCatalogStore({ probe })
    await store.getState().addFiles(['a.png', 'b.png', 'c.mp4'])
    store.getState().setReference('b.png')

    store.getState().removeItem('b.png')
    expect(store.getState().referencePath).toBe('a.png')
    expect(store.getState().getDimensionGroups().map(group => group.key)).toEqual(['800x600', '640x480'])
  })

  it('clears everything', async () => {
    const store = createMediaCatalogStore({ probe })
    await store.getState().addFiles(['a.png'])

    store.getState().clear()
    expect(store.getState().items).toEqual([])
    expect(store.getState().getReferenceItem()).toBeNull()
    expect(store.getState().getEligibleItems()).toEqual([])
  })
})
