/**
 * Hit testing for the crop rectangle's handles.
 *
 * Precedence: corners, then edge midpoints, then the interior (move). Each handle zone is
 * centered on the transformed boundary point and accepts points closer than
 * `handleSize + HANDLE_HIT_PADDING` on both axes.
 */

import type { CropRect, CursorStyle, DragMode, HandlePosition, Point, ViewportTransform } from '../../types/crop'
import { HANDLE_HIT_PADDING, DEFAULT_HANDLE_SIZE } from './constants'
import { regionToViewport } from './coordinate-mapper'
import { isEmptyRegion } from './crop-region'

export interface HitTestOptions {
  handleSize?: number
  /** Edge handles are skipped while the aspect ratio is locked */
  aspectLocked?: boolean
}

/** Viewport-space anchor point of every handle, in hit-test order. */
export function getHandlePoints(viewRect: CropRect): Array<{ position: HandlePosition; point: Point }> {
  const left = viewRect.x
  const top = viewRect.y
  const right = viewRect.x + viewRect.width
  const bottom = viewRect.y + viewRect.height
  const centerX = viewRect.x + viewRect.width / 2
  const centerY = viewRect.y + viewRect.height / 2

  return [
    { position: 'top-left', point: { x: left, y: top } },
    { position: 'top-right', point: { x: right, y: top } },
    { position: 'bottom-left', point: { x: left, y: bottom } },
    { position: 'bottom-right', point: { x: right, y: bottom } },
    { position: 'top', point: { x: centerX, y: top } },
    { position: 'bottom', point: { x: centerX, y: bottom } },
    { position: 'left', point: { x: left, y: centerY } },
    { position: 'right', point: { x: right, y: centerY } },
  ]
}

function isEdge(position: HandlePosition): boolean {
  return position === 'top' || position === 'bottom' || position === 'left' || position === 'right'
}

/**
 * Which drag mode a viewport-space point would start, or null for "nothing here".
 */
export function hitTestRegion(
  point: Point,
  region: CropRect,
  transform: ViewportTransform,
  options: HitTestOptions = {}
): DragMode | null {
  if (isEmptyRegion(region)) return null

  const tolerance = (options.handleSize ?? DEFAULT_HANDLE_SIZE) + HANDLE_HIT_PADDING
  const viewRect = regionToViewport(region, transform)

  for (const handle of getHandlePoints(viewRect)) {
    if (options.aspectLocked && isEdge(handle.position)) continue
    if (Math.abs(point.x - handle.point.x) < tolerance && Math.abs(point.y - handle.point.y) < tolerance) {
      return handle.position
    }
  }

  const inside =
    point.x >= viewRect.x &&
    point.x < viewRect.x + viewRect.width &&
    point.y >= viewRect.y &&
    point.y < viewRect.y + viewRect.height

  return inside ? 'move' : null
}

export function getHandleCursorStyle(mode: DragMode | null): CursorStyle {
  switch (mode) {
    case 'move':
      return 'move'
    case 'top-left':
    case 'bottom-right':
      return 'nwse-resize'
    case 'top-right':
    case 'bottom-left':
      return 'nesw-resize'
    case 'top':
    case 'bottom':
      return 'ns-resize'
    case 'left':
    case 'right':
      return 'ew-resize'
    case null:
      return 'default'
  }
}
