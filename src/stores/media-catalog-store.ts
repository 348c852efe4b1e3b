/**
 * Media catalog: the ordered list of files the operator added, with their probed
 * dimensions, and the reference item whose size defines which files a batch touches.
 */

import { createStore } from 'zustand/vanilla'
import { immer } from 'zustand/middleware/immer'
import type { DimensionGroup, MediaItem, MediaProbe } from '../types/media'
import { groupByDimensions, hasSameDimensions } from '../features/media/dimension-groups'

export interface UnreadableFile {
  path: string
  reason: string
}

export interface AddFilesReport {
  added: MediaItem[]
  /** Already in the catalog, or listed twice */
  duplicates: string[]
  unreadable: UnreadableFile[]
  /** Every size group in the catalog after the add; more than one means a mixed batch */
  dimensionGroups: DimensionGroup[]
}

export interface MediaCatalogState {
  items: MediaItem[]
  referencePath: string | null
}

interface MediaCatalogActions {
  addFiles: (paths: string[]) => Promise<AddFilesReport>
  removeItem: (path: string) => void
  clear: () => void
  /** Returns false when the path is not in the catalog */
  setReference: (path: string) => boolean
  getReferenceItem: () => MediaItem | null
  getDimensionGroups: () => DimensionGroup[]
  /** Items whose size equals the reference item's (the reference included) */
  getEligibleItems: () => MediaItem[]
}

export type MediaCatalogStore = MediaCatalogState & MediaCatalogActions

export interface MediaCatalogOptions {
  probe: MediaProbe
}

export function createMediaCatalogStore({ probe }: MediaCatalogOptions) {
  return createStore<MediaCatalogStore>()(
    immer((set, get) => ({
      items: [],
      referencePath: null,

      addFiles: async (paths) => {
        const known = new Set(get().items.map(item => item.path))
        const added: MediaItem[] = []
        const duplicates: string[] = []
        const unreadable: UnreadableFile[] = []

        for (const path of paths) {
          if (known.has(path)) {
            duplicates.push(path)
            continue
          }
          known.add(path)

          try {
            const probed = await probe(path)
            added.push({ ...probed, path })
          } catch (error) {
            unreadable.push({ path, reason: error instanceof Error ? error.message : String(error) })
          }
        }

        if (added.length > 0) {
          set((state) => {
            // Another addFiles may have finished while this one was probing
            const present = new Set(state.items.map(item => item.path))
            for (const item of added) {
              if (!present.has(item.path)) state.items.push(item)
            }
            if (state.referencePath === null && state.items.length > 0) {
              state.referencePath = state.items[0].path
            }
          })
        }

        return {
          added,
          duplicates,
          unreadable,
          dimensionGroups: groupByDimensions(get().items),
        }
      },

      removeItem: (path) => {
        set((state) => {
          const index = state.items.findIndex(item => item.path === path)
          if (index === -1) return
          state.items.splice(index, 1)
          if (state.referencePath === path) {
            state.referencePath = state.items.length > 0 ? state.items[0].path : null
          }
        })
      },

      clear: () => {
        set((state) => {
          state.items = []
          state.referencePath = null
        })
      },

      setReference: (path) => {
        if (!get().items.some(item => item.path === path)) return false
        set((state) => {
          state.referencePath = path
        })
        return true
      },

      getReferenceItem: () => {
        const { items, referencePath } = get()
        return items.find(item => item.path === referencePath) ?? null
      },

      getDimensionGroups: () => groupByDimensions(get().items),

      getEligibleItems: () => {
        const reference = get().getReferenceItem()
        if (!reference) return []
        return get().items.filter(item => hasSameDimensions(item, reference))
      },
    }))
  )
}

export type MediaCatalogStoreApi = ReturnType<typeof createMediaCatalogStore>
