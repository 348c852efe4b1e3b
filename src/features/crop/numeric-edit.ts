/**
 * Spin-box editing of the crop rectangle.
 *
 * The edited field is clamped into its own range first, then its partner on the same axis is
 * re-clamped: moving x shrinks the width if needed, widening shifts x back inside the image.
 */

import type { CropField, CropFieldRanges, CropRect, Size } from '../../types/crop'
import { clamp, roundHalfAwayFromZero } from '../../shared/utils/math'
import { MIN_CROP_SIZE } from './constants'
import { isEmptyRegion } from './crop-region'

interface AxisSpan {
  position: number
  length: number
}

function fitSpan(span: AxisSpan, extent: number): AxisSpan {
  const length = clamp(span.length, MIN_CROP_SIZE, extent)
  return { length, position: clamp(span.position, 0, extent - length) }
}

function editPosition(span: AxisSpan, value: number, extent: number): AxisSpan {
  const position = clamp(value, 0, extent - MIN_CROP_SIZE)
  return { position, length: clamp(span.length, MIN_CROP_SIZE, extent - position) }
}

function editLength(span: AxisSpan, value: number, extent: number): AxisSpan {
  const length = clamp(value, MIN_CROP_SIZE, extent)
  return { length, position: clamp(span.position, 0, extent - length) }
}

export function canEditRegion(bounds: Size): boolean {
  return bounds.width >= MIN_CROP_SIZE && bounds.height >= MIN_CROP_SIZE
}

/** Ranges a UI should give its x/y/width/height inputs for an image of `bounds`. */
export function getFieldRanges(bounds: Size): CropFieldRanges {
  const width = Math.max(MIN_CROP_SIZE, bounds.width)
  const height = Math.max(MIN_CROP_SIZE, bounds.height)
  return {
    x: { min: 0, max: width - MIN_CROP_SIZE },
    y: { min: 0, max: height - MIN_CROP_SIZE },
    width: { min: MIN_CROP_SIZE, max: width },
    height: { min: MIN_CROP_SIZE, max: height },
  }
}

/**
 * Apply one field edit. An empty region is treated as a MIN_CROP_SIZE square at its origin.
 * Returns null when the value is not a number or the image is smaller than the minimum size.
 */
export function applyFieldEdit(
  current: CropRect,
  field: CropField,
  value: number,
  bounds: Size
): CropRect | null {
  if (!Number.isFinite(value) || !canEditRegion(bounds)) return null

  const rounded = roundHalfAwayFromZero(value)
  const empty = isEmptyRegion(current)
  let horizontal: AxisSpan = {
    position: current.x,
    length: empty ? MIN_CROP_SIZE : current.width,
  }
  let vertical: AxisSpan = {
    position: current.y,
    length: empty ? MIN_CROP_SIZE : current.height,
  }

  switch (field) {
    case 'x':
      horizontal = editPosition(horizontal, rounded, bounds.width)
      vertical = fitSpan(vertical, bounds.height)
      break
    case 'width':
      horizontal = editLength(horizontal, rounded, bounds.width)
      vertical = fitSpan(vertical, bounds.height)
      break
    case 'y':
      vertical = editPosition(vertical, rounded, bounds.height)
      horizontal = fitSpan(horizontal, bounds.width)
      break
    case 'height':
      vertical = editLength(vertical, rounded, bounds.height)
      horizontal = fitSpan(horizontal, bounds.width)
      break
  }

  return {
    x: horizontal.position,
    y: vertical.position,
    width: horizontal.length,
    height: vertical.length,
  }
}
