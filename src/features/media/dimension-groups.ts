import type { Size } from '../../types/crop'
import type { DimensionGroup, MediaItem } from '../../types/media'

export function getDimensionKey(size: Size): string {
  return `${size.width}x${size.height}`
}

export function hasSameDimensions(a: Size, b: Size): boolean {
  return a.width === b.width && a.height === b.height
}

/** Groups items by exact pixel size, in order of first appearance. */
export function groupByDimensions(items: readonly MediaItem[]): DimensionGroup[] {
  const groups = new Map<string, DimensionGroup>()
  for (const item of items) {
    const key = getDimensionKey(item)
    const group = groups.get(key)
    if (group) {
      group.paths.push(item.path)
    } else {
      groups.set(key, { key, width: item.width, height: item.height, paths: [item.path] })
    }
  }
  return Array.from(groups.values())
}
