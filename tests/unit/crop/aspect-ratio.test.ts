import {
  fitLockedSize,
  isAspectLocked,
  isWidthDriven,
  normalizeRatio,
  resizeLockedCorner,
} from '@/features/crop/aspect-ratio'
import { createRegion } from '@/features/crop/crop-region'
import type { CornerHandle } from '@/types/crop'

const bounds = { width: 800, height: 600 }
const lock = { locked: true, ratio: 2 }

describe('aspect-ratio', () => {
  it('only treats a positive, finite, locked ratio as active', () => {
    expect(isAspectLocked(lock)).toBe(true)
    expect(isAspectLocked({ locked: false, ratio: 2 })).toBe(false)
    expect(isAspectLocked({ locked: true, ratio: 0 })).toBe(false)
    expect(isAspectLocked(null)).toBe(false)
  })

  it('parses width:height pairs', () => {
    expect(normalizeRatio(16, 9)).toBeCloseTo(16 / 9, 10)
    expect(normalizeRatio(0, 9)).toBeNull()
    expect(normalizeRatio(4, Number.NaN)).toBeNull()
  })

  it('breaks ties in favour of width', () => {
    expect(isWidthDriven({ x: 100, y: 50 }, 2)).toBe(true)
    expect(isWidthDriven({ x: 99, y: 50 }, 2)).toBe(false)
  })

  it('shrinks a locked size to fit while keeping the ratio', () => {
    expect(fitLockedSize({ width: 1000, height: 500 }, 100, 500, 2)).toEqual({ width: 100, height: 50 })
    expect(fitLockedSize({ width: 400, height: 200 }, 700, 150, 2)).toEqual({ width: 300, height: 150 })
  })

  describe('new selections', () => {
    it('follows the horizontal drag when it dominates', () => {
      expect(createRegion({ x: 100, y: 100 }, { x: 300, y: 150 }, bounds, lock)).toEqual({
        x: 100,
        y: 100,
        width: 200,
        height: 100,
      })
    })

    it('follows the vertical drag when it dominates', () => {
      expect(createRegion({ x: 100, y: 100 }, { x: 150, y: 300 }, bounds, lock)).toEqual({
        x: 100,
        y: 100,
        width: 400,
        height: 200,
      })
    })

    it('grows into the quadrant of the drag', () => {
      expect(createRegion({ x: 500, y: 400 }, { x: 300, y: 300 }, bounds, lock)).toEqual({
        x: 300,
        y: 300,
        width: 200,
        height: 100,
      })
    })

    it('shrinks to stay inside the image', () => {
      expect(createRegion({ x: 700, y: 100 }, { x: 800, y: 600 }, bounds, lock)).toEqual({
        x: 700,
        y: 100,
        width: 100,
        height: 50,
      })
    })
  })

  describe('corner resize', () => {
    const start = { x: 100, y: 100, width: 200, height: 100 }

    it('derives height from width for a mostly horizontal drag', () => {
      expect(resizeLockedCorner(start, 'bottom-right', { x: 100, y: 10 }, bounds, 2)).toEqual({
        x: 100,
        y: 100,
        width: 300,
        height: 150,
      })
    })

    it('keeps the opposite corner fixed and fits against the image edge', () => {
      expect(resizeLockedCorner(start, 'top-left', { x: -10, y: -60 }, bounds, 2)).toEqual({
        x: 0,
        y: 50,
        width: 300,
        height: 150,
      })
    })

    it('rejects a drag that would go below the minimum size', () => {
      expect(resizeLockedCorner(start, 'bottom-right', { x: -195, y: 0 }, bounds, 2)).toBeNull()
    })

    it('keeps the ratio within a pixel for every corner', () => {
      const corners: CornerHandle[] = ['top-left', 'top-right', 'bottom-left', 'bottom-right']
      const ratio = 16 / 9
      const region = { x: 200, y: 150, width: 320, height: 180 }
      for (const corner of corners) {
        for (const delta of [{ x: 37, y: 5 }, { x: -41, y: 90 }, { x: 13, y: -77 }, { x: -500, y: -500 }]) {
          const result = resizeLockedCorner(region, corner, delta, bounds, ratio)
          if (!result) continue
          expect(Math.abs(result.width - result.height * ratio)).toBeLessThanOrEqual(1)
          expect(result.x).toBeGreaterThanOrEqual(0)
          expect(result.y).toBeGreaterThanOrEqual(0)
          expect(result.x + result.width).toBeLessThanOrEqual(bounds.width)
          expect(result.y + result.height).toBeLessThanOrEqual(bounds.height)
        }
      }
    })
  })
})
