/**
 * Viewport <-> image-space transforms for the crop editor.
 *
 * The scaled image is drawn centered on a canvas that is CANVAS_SCALE_MULTIPLIER times its
 * size, so the user can pan past the image edges without the canvas being resized on every
 * zoom step. Viewport space is canvas pixels; image space is source pixels.
 */

import type { CropRect, Point, Size, ViewportTransform } from '../../types/crop'
import { roundHalfAwayFromZero } from '../../shared/utils/math'

export { roundHalfAwayFromZero }

export const CANVAS_SCALE_MULTIPLIER = 3

export function getScaledImageSize(imageSize: Size, scale: number): Size {
  return {
    width: Math.max(1, roundHalfAwayFromZero(imageSize.width * scale)),
    height: Math.max(1, roundHalfAwayFromZero(imageSize.height * scale)),
  }
}

export function computeCanvasSize(imageSize: Size, scale: number): Size {
  const scaled = getScaledImageSize(imageSize, scale)
  return {
    width: scaled.width * CANVAS_SCALE_MULTIPLIER,
    height: scaled.height * CANVAS_SCALE_MULTIPLIER,
  }
}

/**
 * Offset of the image's top-left corner inside the canvas.
 */
export function computeImageOffset(imageSize: Size, scale: number): Point {
  const scaled = getScaledImageSize(imageSize, scale)
  const canvas = computeCanvasSize(imageSize, scale)
  return {
    x: Math.floor((canvas.width - scaled.width) / 2),
    y: Math.floor((canvas.height - scaled.height) / 2),
  }
}

export function createViewportTransform(imageSize: Size, scale: number): ViewportTransform {
  const offset = computeImageOffset(imageSize, scale)
  return { scale, offsetX: offset.x, offsetY: offset.y }
}

/** Unrounded image-space point under a viewport point. */
export function toImageSpace(point: Point, transform: ViewportTransform): Point {
  return {
    x: (point.x - transform.offsetX) / transform.scale,
    y: (point.y - transform.offsetY) / transform.scale,
  }
}

/** Source pixel under a viewport point. */
export function toImagePixel(point: Point, transform: ViewportTransform): Point {
  const p = toImageSpace(point, transform)
  return { x: roundHalfAwayFromZero(p.x), y: roundHalfAwayFromZero(p.y) }
}

export function toViewportSpace(point: Point, transform: ViewportTransform): Point {
  return {
    x: roundHalfAwayFromZero(point.x * transform.scale + transform.offsetX),
    y: roundHalfAwayFromZero(point.y * transform.scale + transform.offsetY),
  }
}

/**
 * Map a crop rectangle into viewport space. Edges are mapped independently so adjacent
 * rectangles never open a gap through rounding.
 */
export function regionToViewport(rect: CropRect, transform: ViewportTransform): CropRect {
  const topLeft = toViewportSpace({ x: rect.x, y: rect.y }, transform)
  const bottomRight = toViewportSpace(
    { x: rect.x + rect.width, y: rect.y + rect.height },
    transform
  )
  return {
    x: topLeft.x,
    y: topLeft.y,
    width: bottomRight.x - topLeft.x,
    height: bottomRight.y - topLeft.y,
  }
}

/** Convert a viewport-space displacement into source pixels. */
export function deltaToImageSpace(delta: Point, transform: ViewportTransform): Point {
  return {
    x: roundHalfAwayFromZero(delta.x / transform.scale),
    y: roundHalfAwayFromZero(delta.y / transform.scale),
  }
}

export function isPointInImage(imagePoint: Point, imageSize: Size): boolean {
  return (
    imagePoint.x >= 0 &&
    imagePoint.y >= 0 &&
    imagePoint.x <= imageSize.width &&
    imagePoint.y <= imageSize.height
  )
}
