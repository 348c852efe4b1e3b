/**
 * Aspect-lock geometry.
 *
 * One rule decides which dimension follows the pointer, for new selections and for every
 * corner: width drives height unless the vertical displacement, expressed as the width it
 * would imply (|dy| * ratio), is strictly larger than the horizontal one. Ties are
 * width-driven.
 */

import type { AspectRatioConstraint, CornerHandle, CropRect, HandlePosition, Point, Size } from '../../types/crop'
import { clamp, roundHalfAwayFromZero } from '../../shared/utils/math'
import { MIN_CROP_SIZE } from './constants'

export function isAspectLocked(
  constraint: AspectRatioConstraint | null | undefined
): constraint is AspectRatioConstraint {
  return (
    constraint != null &&
    constraint.locked &&
    Number.isFinite(constraint.ratio) &&
    constraint.ratio > 0
  )
}

/**
 * Ratio from a width:height pair such as 16:9. Returns null when either side is not a
 * positive number.
 */
export function normalizeRatio(width: number, height: number): number | null {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    return null
  }
  return width / height
}

export function isCornerHandle(handle: HandlePosition): handle is CornerHandle {
  return (
    handle === 'top-left' ||
    handle === 'top-right' ||
    handle === 'bottom-left' ||
    handle === 'bottom-right'
  )
}

export function isWidthDriven(delta: Point, ratio: number): boolean {
  return Math.abs(delta.x) >= Math.abs(delta.y) * ratio
}

export function heightForWidth(width: number, ratio: number): number {
  return roundHalfAwayFromZero(width / ratio)
}

export function widthForHeight(height: number, ratio: number): number {
  return roundHalfAwayFromZero(height * ratio)
}

/**
 * Shrink a ratio-locked size until it fits the available room, keeping the ratio.
 */
export function fitLockedSize(size: Size, maxWidth: number, maxHeight: number, ratio: number): Size {
  let { width, height } = size
  if (width > maxWidth) {
    width = maxWidth
    height = heightForWidth(width, ratio)
  }
  if (height > maxHeight) {
    height = maxHeight
    width = Math.min(maxWidth, widthForHeight(height, ratio))
  }
  return { width: Math.max(0, width), height: Math.max(0, height) }
}

/**
 * New selection under an aspect lock. The rectangle is anchored at the mouse-down point and
 * grows into the quadrant given by the signs of the drag.
 */
export function createLockedRegion(anchor: Point, pointer: Point, bounds: Size, ratio: number): CropRect {
  const dx = pointer.x - anchor.x
  const dy = pointer.y - anchor.y
  const growsRight = dx >= 0
  const growsDown = dy >= 0

  let width: number
  let height: number
  if (isWidthDriven({ x: dx, y: dy }, ratio)) {
    width = Math.abs(dx)
    height = heightForWidth(width, ratio)
  } else {
    height = Math.abs(dy)
    width = widthForHeight(height, ratio)
  }

  const maxWidth = growsRight ? bounds.width - anchor.x : anchor.x
  const maxHeight = growsDown ? bounds.height - anchor.y : anchor.y
  const size = fitLockedSize({ width, height }, maxWidth, maxHeight, ratio)

  return {
    x: growsRight ? anchor.x : anchor.x - size.width,
    y: growsDown ? anchor.y : anchor.y - size.height,
    width: size.width,
    height: size.height,
  }
}

/**
 * Corner resize under an aspect lock. The opposite corner stays fixed; returns null when the
 * drag would invert the rectangle or shrink it below the minimum size.
 */
export function resizeLockedCorner(
  start: CropRect,
  handle: CornerHandle,
  delta: Point,
  bounds: Size,
  ratio: number
): CropRect | null {
  const movesLeft = handle === 'top-left' || handle === 'bottom-left'
  const movesTop = handle === 'top-left' || handle === 'top-right'

  const fixedX = movesLeft ? start.x + start.width : start.x
  const fixedY = movesTop ? start.y + start.height : start.y

  const cornerX = clamp((movesLeft ? start.x : start.x + start.width) + delta.x, 0, bounds.width)
  const cornerY = clamp((movesTop ? start.y : start.y + start.height) + delta.y, 0, bounds.height)

  let width = movesLeft ? fixedX - cornerX : cornerX - fixedX
  let height = movesTop ? fixedY - cornerY : cornerY - fixedY

  if (isWidthDriven(delta, ratio)) {
    if (width < MIN_CROP_SIZE) return null
    height = heightForWidth(width, ratio)
  } else {
    if (height < MIN_CROP_SIZE) return null
    width = widthForHeight(height, ratio)
  }

  const maxWidth = movesLeft ? fixedX : bounds.width - fixedX
  const maxHeight = movesTop ? fixedY : bounds.height - fixedY
  const size = fitLockedSize({ width, height }, maxWidth, maxHeight, ratio)
  if (size.width < MIN_CROP_SIZE || size.height < MIN_CROP_SIZE) return null

  return {
    x: movesLeft ? fixedX - size.width : fixedX,
    y: movesTop ? fixedY - size.height : fixedY,
    width: size.width,
    height: size.height,
  }
}
