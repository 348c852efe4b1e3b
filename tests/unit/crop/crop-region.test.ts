import {
  clampRegion,
  createRegion,
  isEmptyRegion,
  isRegionWithinBounds,
  moveRegion,
  resizeRegion,
} from '@/features/crop/crop-region'
import type { CropRect, HandlePosition } from '@/types/crop'

const bounds = { width: 800, height: 600 }

describe('crop-region', () => {
  describe('createRegion', () => {
    it('normalizes a drag toward the top-left', () => {
      expect(createRegion({ x: 100, y: 100 }, { x: 50, y: 300 }, bounds)).toEqual({
        x: 50,
        y: 100,
        width: 50,
        height: 200,
      })
    })

    it('clamps the pointer to the image', () => {
      expect(createRegion({ x: 700, y: 100 }, { x: 900, y: -20 }, bounds)).toEqual({
        x: 700,
        y: 0,
        width: 100,
        height: 100,
      })
    })

    it('allows a rubber band below the minimum size', () => {
      expect(createRegion({ x: 10, y: 10 }, { x: 13, y: 12 }, bounds)).toEqual({
        x: 10,
        y: 10,
        width: 3,
        height: 2,
      })
    })
  })

  describe('moveRegion', () => {
    it('translates by the delta', () => {
      expect(moveRegion({ x: 100, y: 100, width: 50, height: 50 }, { x: 20, y: -30 }, bounds)).toEqual({
        x: 120,
        y: 70,
        width: 50,
        height: 50,
      })
    })

    it('stops at the image edges without changing size', () => {
      expect(moveRegion({ x: 700, y: 500, width: 100, height: 100 }, { x: 50, y: 50 }, bounds)).toEqual({
        x: 700,
        y: 500,
        width: 100,
        height: 100,
      })
      expect(moveRegion({ x: 10, y: 10, width: 100, height: 100 }, { x: -50, y: -50 }, bounds)).toEqual({
        x: 0,
        y: 0,
        width: 100,
        height: 100,
      })
    })
  })

  describe('resizeRegion', () => {
    const start: CropRect = { x: 100, y: 100, width: 200, height: 100 }

    it('moves the edges named by a corner handle', () => {
      expect(resizeRegion(start, 'bottom-right', { x: 50, y: -20 }, bounds)).toEqual({
        x: 100,
        y: 100,
        width: 250,
        height: 80,
      })
    })

    it('only moves one edge for an edge handle', () => {
      expect(resizeRegion(start, 'top', { x: 40, y: -30 }, bounds)).toEqual({
        x: 100,
        y: 70,
        width: 200,
        height: 130,
      })
    })

    it('clamps the dragged edges to the image', () => {
      expect(resizeRegion(start, 'top-left', { x: -150, y: -150 }, bounds)).toEqual({
        x: 0,
        y: 0,
        width: 300,
        height: 200,
      })
    })

    it('rejects results smaller than the minimum size', () => {
      expect(resizeRegion(start, 'left', { x: 195, y: 0 }, bounds)).toBeNull()
      expect(resizeRegion(start, 'bottom', { x: 0, y: -95 }, bounds)).toBeNull()
    })

    it('rejects inverted rectangles', () => {
      expect(resizeRegion(start, 'right', { x: -300, y: 0 }, bounds)).toBeNull()
    })

    it('disables edge handles under an aspect lock', () => {
      expect(resizeRegion(start, 'right', { x: 10, y: 0 }, bounds, { locked: true, ratio: 2 })).toBeNull()
    })

    it('keeps every accepted result inside the image and above the minimum size', () => {
      const handles: HandlePosition[] = [
        'top-left', 'top-right', 'bottom-left', 'bottom-right', 'top', 'bottom', 'left', 'right',
      ]
      const deltas = [-1000, -250, -95, -3, 0, 7, 120, 1000]
      for (const handle of handles) {
        for (const dx of deltas) {
          for (const dy of deltas) {
            const result = resizeRegion(start, handle, { x: dx, y: dy }, bounds)
            if (result) {
              expect(isRegionWithinBounds(result, bounds, 10)).toBe(true)
            }
          }
        }
      }
    })
  })

  describe('clampRegion', () => {
    it('fits a rectangle from another image into the bounds', () => {
      expect(clampRegion({ x: 700, y: -5, width: 200.4, height: 50 }, bounds)).toEqual({
        x: 600,
        y: 0,
        width: 200,
        height: 50,
      })
    })

    it('shrinks rectangles larger than the image', () => {
      expect(clampRegion({ x: 0, y: 0, width: 1000, height: 1000 }, bounds)).toEqual({
        x: 0,
        y: 0,
        width: 800,
        height: 600,
      })
    })

    it('returns an empty region for an empty input', () => {
      expect(isEmptyRegion(clampRegion({ x: 5, y: 5, width: 0, height: 10 }, bounds))).toBe(true)
    })
  })

  describe('isRegionWithinBounds', () => {
    it('accepts a full-frame region', () => {
      expect(isRegionWithinBounds({ x: 0, y: 0, width: 800, height: 600 }, bounds)).toBe(true)
    })

    it('rejects regions that leave the image or are fractional', () => {
      expect(isRegionWithinBounds({ x: 1, y: 0, width: 800, height: 600 }, bounds)).toBe(false)
      expect(isRegionWithinBounds({ x: -1, y: 0, width: 10, height: 10 }, bounds)).toBe(false)
      expect(isRegionWithinBounds({ x: 0.5, y: 0, width: 10, height: 10 }, bounds)).toBe(false)
      expect(isRegionWithinBounds({ x: 0, y: 0, width: 0, height: 10 }, bounds)).toBe(false)
    })
  })
})
