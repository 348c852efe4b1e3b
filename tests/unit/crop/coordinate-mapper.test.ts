import {
  computeCanvasSize,
  computeImageOffset,
  createViewportTransform,
  deltaToImageSpace,
  isPointInImage,
  regionToViewport,
  roundHalfAwayFromZero,
  toImagePixel,
  toImageSpace,
  toViewportSpace,
} from '@/features/crop/coordinate-mapper'

describe('coordinate-mapper', () => {
  describe('roundHalfAwayFromZero', () => {
    it('rounds halves away from zero on both sides', () => {
      expect(roundHalfAwayFromZero(2.5)).toBe(3)
      expect(roundHalfAwayFromZero(-2.5)).toBe(-3)
      expect(roundHalfAwayFromZero(2.49)).toBe(2)
    })

    it('never produces negative zero', () => {
      expect(roundHalfAwayFromZero(-0.4)).toBe(0)
    })
  })

  describe('canvas layout', () => {
    it('centers the scaled image on a canvas three times its size', () => {
      expect(computeCanvasSize({ width: 200, height: 100 }, 2)).toEqual({ width: 1200, height: 600 })
      expect(computeImageOffset({ width: 200, height: 100 }, 2)).toEqual({ x: 400, y: 200 })
    })

    it('never shrinks the scaled image below one pixel', () => {
      expect(computeCanvasSize({ width: 4, height: 4 }, 0.1)).toEqual({ width: 3, height: 3 })
    })
  })

  describe('point transforms', () => {
    const transform = createViewportTransform({ width: 200, height: 100 }, 2)

    it('maps viewport points into image space', () => {
      expect(toImageSpace({ x: 410, y: 221 }, transform)).toEqual({ x: 5, y: 10.5 })
      expect(toImagePixel({ x: 410, y: 221 }, transform)).toEqual({ x: 5, y: 11 })
    })

    it('maps image points into viewport space', () => {
      expect(toViewportSpace({ x: 5, y: 10 }, transform)).toEqual({ x: 410, y: 220 })
    })

    it('maps rectangle edges independently', () => {
      expect(regionToViewport({ x: 10, y: 20, width: 30, height: 40 }, transform)).toEqual({
        x: 420,
        y: 240,
        width: 60,
        height: 80,
      })
    })

    it('converts viewport deltas into whole source pixels', () => {
      expect(deltaToImageSpace({ x: 5, y: -5 }, transform)).toEqual({ x: 3, y: -3 })
    })

    it('treats the image edges as inside', () => {
      expect(isPointInImage({ x: 200, y: 100 }, { width: 200, height: 100 })).toBe(true)
      expect(isPointInImage({ x: 200.5, y: 0 }, { width: 200, height: 100 })).toBe(false)
      expect(isPointInImage({ x: -0.1, y: 0 }, { width: 200, height: 100 })).toBe(false)
    })
  })

  it('round-trips viewport points within one pixel at every zoom level', () => {
    const imageSize = { width: 1280, height: 720 }
    for (const scale of [0.1, 0.37, 0.95, 1, 2.5, 7.3, 10]) {
      const transform = createViewportTransform(imageSize, scale)
      for (const point of [{ x: 0, y: 0 }, { x: 333, y: 187 }, { x: 1021, y: 640 }]) {
        const back = toViewportSpace(toImageSpace(point, transform), transform)
        expect(Math.abs(back.x - point.x)).toBeLessThanOrEqual(1)
        expect(Math.abs(back.y - point.y)).toBeLessThanOrEqual(1)
      }
    }
  })
})
