/**
 * Crop rectangle model.
 *
 * All operations are pure and work in integer source pixels. Move and resize never return a
 * rectangle that leaves the image or drops below MIN_CROP_SIZE; a resize that would is
 * rejected with `null` so the caller keeps the prior rectangle.
 */

import type { AspectRatioConstraint, CropRect, HandlePosition, Point, Size } from '../../types/crop'
import { clamp } from '../../shared/utils/math'
import { MIN_CROP_SIZE } from './constants'
import { createLockedRegion, isAspectLocked, isCornerHandle, resizeLockedCorner } from './aspect-ratio'

export const EMPTY_REGION: Readonly<CropRect> = Object.freeze({ x: 0, y: 0, width: 0, height: 0 })

export function isEmptyRegion(rect: CropRect): boolean {
  return rect.width <= 0 || rect.height <= 0
}

export function regionsEqual(a: CropRect, b: CropRect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height
}

export function isRegionWithinBounds(rect: CropRect, bounds: Size, minSize = 1): boolean {
  return (
    Number.isInteger(rect.x) &&
    Number.isInteger(rect.y) &&
    Number.isInteger(rect.width) &&
    Number.isInteger(rect.height) &&
    rect.x >= 0 &&
    rect.y >= 0 &&
    rect.width >= minSize &&
    rect.height >= minSize &&
    rect.x + rect.width <= bounds.width &&
    rect.y + rect.height <= bounds.height
  )
}

export function cloneRegion(rect: CropRect): CropRect {
  return { x: rect.x, y: rect.y, width: rect.width, height: rect.height }
}

/**
 * Rubber-band selection from the mouse-down anchor to the pointer.
 * The result may be smaller than MIN_CROP_SIZE while the button is still held.
 */
export function createRegion(
  anchor: Point,
  pointer: Point,
  bounds: Size,
  aspect?: AspectRatioConstraint | null
): CropRect {
  const start = {
    x: clamp(anchor.x, 0, bounds.width),
    y: clamp(anchor.y, 0, bounds.height),
  }
  const end = {
    x: clamp(pointer.x, 0, bounds.width),
    y: clamp(pointer.y, 0, bounds.height),
  }

  if (isAspectLocked(aspect)) {
    return createLockedRegion(start, end, bounds, aspect.ratio)
  }

  return {
    x: Math.min(start.x, end.x),
    y: Math.min(start.y, end.y),
    width: Math.abs(end.x - start.x),
    height: Math.abs(end.y - start.y),
  }
}

export function moveRegion(start: CropRect, delta: Point, bounds: Size): CropRect {
  return {
    x: clamp(start.x + delta.x, 0, Math.max(0, bounds.width - start.width)),
    y: clamp(start.y + delta.y, 0, Math.max(0, bounds.height - start.height)),
    width: start.width,
    height: start.height,
  }
}

/**
 * Resize from the handle's edges by `delta` (source pixels, relative to the drag start).
 * Single-edge handles are disabled under an aspect lock.
 */
export function resizeRegion(
  start: CropRect,
  handle: HandlePosition,
  delta: Point,
  bounds: Size,
  aspect?: AspectRatioConstraint | null
): CropRect | null {
  if (isAspectLocked(aspect)) {
    if (!isCornerHandle(handle)) return null
    return resizeLockedCorner(start, handle, delta, bounds, aspect.ratio)
  }

  let left = start.x
  let top = start.y
  let right = start.x + start.width
  let bottom = start.y + start.height

  switch (handle) {
    case 'top-left':
      left += delta.x
      top += delta.y
      break
    case 'top-right':
      right += delta.x
      top += delta.y
      break
    case 'bottom-left':
      left += delta.x
      bottom += delta.y
      break
    case 'bottom-right':
      right += delta.x
      bottom += delta.y
      break
    case 'top':
      top += delta.y
      break
    case 'bottom':
      bottom += delta.y
      break
    case 'left':
      left += delta.x
      break
    case 'right':
      right += delta.x
      break
  }

  left = Math.max(0, left)
  top = Math.max(0, top)
  right = Math.min(bounds.width, right)
  bottom = Math.min(bounds.height, bottom)

  if (right - left < MIN_CROP_SIZE || bottom - top < MIN_CROP_SIZE) {
    return null
  }

  return { x: left, y: top, width: right - left, height: bottom - top }
}

/**
 * Fit an arbitrary rectangle into `bounds`, shrinking it only when it is larger than the
 * image. Returns an empty region when nothing of it can be kept.
 */
export function clampRegion(rect: CropRect, bounds: Size): CropRect {
  if (isEmptyRegion(rect) || bounds.width <= 0 || bounds.height <= 0) {
    return cloneRegion(EMPTY_REGION)
  }
  const width = Math.min(Math.round(rect.width), bounds.width)
  const height = Math.min(Math.round(rect.height), bounds.height)
  return {
    x: clamp(Math.round(rect.x), 0, bounds.width - width),
    y: clamp(Math.round(rect.y), 0, bounds.height - height),
    width,
    height,
  }
}
