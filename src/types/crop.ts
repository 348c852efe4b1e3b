export interface Point {
  x: number
  y: number
}

export interface Size {
  width: number
  height: number
}

/**
 * Crop rectangle in source-pixel space. All four values are integers.
 * A rectangle with a zero side means "no selection".
 */
export interface CropRect {
  x: number
  y: number
  width: number
  height: number
}

export interface AspectRatioConstraint {
  locked: boolean
  /** width / height, always > 0 */
  ratio: number
}

export type CornerHandle = 'top-left' | 'top-right' | 'bottom-left' | 'bottom-right'
export type EdgeHandle = 'top' | 'bottom' | 'left' | 'right'
export type HandlePosition = CornerHandle | EdgeHandle

export type DragMode = 'move' | HandlePosition

export type CursorStyle =
  | 'default'
  | 'move'
  | 'nwse-resize'
  | 'nesw-resize'
  | 'ns-resize'
  | 'ew-resize'
  | 'grabbing'

/** Scale and canvas offset used to map between viewport and image space. */
export interface ViewportTransform {
  scale: number
  offsetX: number
  offsetY: number
}

export type CropField = 'x' | 'y' | 'width' | 'height'

export interface FieldRange {
  min: number
  max: number
}

export type CropFieldRanges = Record<CropField, FieldRange>
