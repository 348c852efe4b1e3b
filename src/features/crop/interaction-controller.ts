/**
 * InteractionController
 *
 * Pointer-event state machine for the crop editor:
 *
 *   idle --primary down on handle--> dragging(mode)
 *   idle --primary down in image---> creating
 *   idle --secondary down----------> panning
 *   creating | dragging --primary up--> idle   (emits "changed" when at least MIN_CROP_SIZE)
 *   panning --secondary up-----------> idle
 *
 * Every drag step is computed from the snapshot taken at pointer-down (anchor rectangle and
 * anchor pointer in image space), never from the previous step, so the same pointer path
 * always yields the same rectangle.
 */

import type {
  AspectRatioConstraint,
  CropField,
  CropFieldRanges,
  CropRect,
  CursorStyle,
  DragMode,
  Point,
  Size,
} from '../../types/crop'
import type { ViewportNavigator } from '../viewport/viewport-navigator'
import { roundHalfAwayFromZero } from '../../shared/utils/math'
import { isPointInImage, toImagePixel, toImageSpace } from './coordinate-mapper'
import {
  EMPTY_REGION,
  clampRegion,
  cloneRegion,
  createRegion,
  moveRegion,
  regionsEqual,
  resizeRegion,
} from './crop-region'
import { isAspectLocked } from './aspect-ratio'
import { MIN_CROP_SIZE } from './constants'
import { getHandleCursorStyle, hitTestRegion } from './hit-testing'
import { applyFieldEdit, getFieldRanges } from './numeric-edit'

export type PointerButton = 'primary' | 'secondary'

export interface PointerInput {
  button: PointerButton
  /** Relative to the scroll window */
  position: Point
  /** Screen position; panning measures against it so scrolling does not feed back */
  globalPosition?: Point
}

export type PointerMoveInput = Omit<PointerInput, 'button'>

export interface DragSession {
  readonly mode: DragMode
  readonly anchorRect: Readonly<CropRect>
  readonly anchorPointer: Readonly<Point>
}

export type InteractionState =
  | { kind: 'idle' }
  | { kind: 'creating'; anchor: Point; previous: CropRect }
  | { kind: 'dragging'; session: DragSession }
  | { kind: 'panning' }

export interface InteractionControllerOptions {
  navigator: ViewportNavigator
  handleSize?: number
  aspect?: AspectRatioConstraint | null
  /** Fired on every intermediate rectangle while the button is held */
  onRegionChanging?: (region: CropRect) => void
  /** Fired once per committed rectangle (release or numeric edit) */
  onRegionChanged?: (region: CropRect) => void
  onCursorChange?: (cursor: CursorStyle) => void
}

function isBelowMinimum(region: CropRect): boolean {
  return region.width < MIN_CROP_SIZE || region.height < MIN_CROP_SIZE
}

export class InteractionController {
  private readonly navigator: ViewportNavigator
  private readonly options: InteractionControllerOptions
  private imageSize: Size | null = null
  private aspect: AspectRatioConstraint | null
  private region: CropRect = cloneRegion(EMPTY_REGION)
  private committed: Readonly<CropRect> = EMPTY_REGION
  private state: InteractionState = { kind: 'idle' }
  private cursor: CursorStyle = 'default'

  constructor(options: InteractionControllerOptions) {
    this.navigator = options.navigator
    this.options = options
    this.aspect = options.aspect ?? null
  }

  /** A new reference image: the selection starts over. */
  loadImage(imageSize: Size): void {
    this.imageSize = { ...imageSize }
    this.navigator.load(imageSize)
    this.region = cloneRegion(EMPTY_REGION)
    this.committed = EMPTY_REGION
    this.state = { kind: 'idle' }
    this.setCursor('default')
  }

  getState(): InteractionState {
    return this.state
  }

  getRegion(): CropRect {
    return cloneRegion(this.region)
  }

  /** Frozen copy of the last committed rectangle; safe to hand to a batch. */
  getCommittedRegion(): Readonly<CropRect> {
    return this.committed
  }

  getCursor(): CursorStyle {
    return this.cursor
  }

  getAspectConstraint(): AspectRatioConstraint | null {
    return this.aspect ? { ...this.aspect } : null
  }

  setAspectConstraint(aspect: AspectRatioConstraint | null): void {
    this.aspect = aspect ? { ...aspect } : null
  }

  getFieldRanges(): CropFieldRanges | null {
    return this.imageSize ? getFieldRanges(this.imageSize) : null
  }

  pointerDown(input: PointerInput): void {
    if (this.state.kind !== 'idle' || !this.imageSize) return

    if (input.button === 'secondary') {
      this.navigator.beginPan(input.globalPosition ?? input.position)
      this.state = { kind: 'panning' }
      this.setCursor('grabbing')
      return
    }

    const canvasPoint = this.navigator.windowToCanvas(input.position)
    const transform = this.navigator.getTransform()
    const mode = hitTestRegion(canvasPoint, this.region, transform, {
      handleSize: this.options.handleSize,
      aspectLocked: isAspectLocked(this.aspect),
    })

    if (mode) {
      this.state = {
        kind: 'dragging',
        session: {
          mode,
          anchorRect: cloneRegion(this.region),
          anchorPointer: toImageSpace(canvasPoint, transform),
        },
      }
      this.setCursor(getHandleCursorStyle(mode))
      return
    }

    if (!isPointInImage(toImageSpace(canvasPoint, transform), this.imageSize)) return

    const anchor = toImagePixel(canvasPoint, transform)
    this.state = { kind: 'creating', anchor, previous: cloneRegion(this.region) }
    this.region = { x: anchor.x, y: anchor.y, width: 0, height: 0 }
  }

  pointerMove(input: PointerMoveInput): void {
    const state = this.state
    switch (state.kind) {
      case 'idle':
        this.updateHoverCursor(input.position)
        return
      case 'creating':
        this.updateCreating(state.anchor, input.position)
        return
      case 'dragging':
        this.updateDragging(state.session, input.position)
        return
      case 'panning':
        this.navigator.panTo(input.globalPosition ?? input.position)
        return
    }
  }

  pointerUp(input: PointerInput): void {
    const state = this.state
    if (state.kind === 'panning') {
      if (input.button !== 'secondary') return
      this.navigator.endPan()
      this.state = { kind: 'idle' }
      this.updateHoverCursor(input.position)
      return
    }

    if (input.button !== 'primary') return
    if (state.kind !== 'creating' && state.kind !== 'dragging') return

    this.state = { kind: 'idle' }
    if (isBelowMinimum(this.region)) {
      // A click or a tiny drag keeps the previous selection.
      const previous = state.kind === 'creating' ? state.previous : state.session.anchorRect
      this.replaceRegion(cloneRegion(previous))
    } else {
      this.commit()
    }
    this.updateHoverCursor(input.position)
  }

  /** Abandon the gesture in progress (Escape) and restore the rectangle it started from. */
  cancelGesture(): void {
    const state = this.state
    this.state = { kind: 'idle' }
    if (state.kind === 'panning') {
      this.navigator.endPan()
    } else if (state.kind === 'creating') {
      this.replaceRegion(cloneRegion(state.previous))
    } else if (state.kind === 'dragging') {
      this.replaceRegion(cloneRegion(state.session.anchorRect))
    }
    this.setCursor('default')
  }

  /**
   * Numeric field edit. Bypasses the pointer state machine but keeps the rectangle valid.
   * Returns false when the edit was rejected.
   */
  editField(field: CropField, value: number): boolean {
    if (!this.imageSize) return false
    const next = applyFieldEdit(this.region, field, value, this.imageSize)
    if (!next) return false
    this.region = next
    this.commit()
    return true
  }

  /**
   * Programmatic placement, e.g. reapplying a stored rectangle after a reload. A rectangle
   * smaller than MIN_CROP_SIZE once fitted clears the selection.
   */
  setRegion(rect: CropRect): void {
    if (!this.imageSize) return
    const next = clampRegion(rect, this.imageSize)
    if (isBelowMinimum(next)) {
      this.clearRegion()
      return
    }
    this.region = next
    this.commit()
  }

  clearRegion(): void {
    this.region = cloneRegion(EMPTY_REGION)
    this.committed = EMPTY_REGION
    this.state = { kind: 'idle' }
  }

  private updateCreating(anchor: Point, windowPoint: Point): void {
    if (!this.imageSize) return
    const pointer = toImagePixel(this.navigator.windowToCanvas(windowPoint), this.navigator.getTransform())
    this.region = createRegion(anchor, pointer, this.imageSize, this.aspect)
    this.options.onRegionChanging?.(cloneRegion(this.region))
  }

  private updateDragging(session: DragSession, windowPoint: Point): void {
    if (!this.imageSize) return
    const pointer = toImageSpace(this.navigator.windowToCanvas(windowPoint), this.navigator.getTransform())
    const delta = {
      x: roundHalfAwayFromZero(pointer.x - session.anchorPointer.x),
      y: roundHalfAwayFromZero(pointer.y - session.anchorPointer.y),
    }

    const next =
      session.mode === 'move'
        ? moveRegion(session.anchorRect, delta, this.imageSize)
        : resizeRegion(session.anchorRect, session.mode, delta, this.imageSize, this.aspect)

    if (!next || regionsEqual(next, this.region)) return
    this.region = next
    this.options.onRegionChanging?.(cloneRegion(next))
  }

  private updateHoverCursor(windowPoint: Point): void {
    const mode = hitTestRegion(
      this.navigator.windowToCanvas(windowPoint),
      this.region,
      this.navigator.getTransform(),
      { handleSize: this.options.handleSize, aspectLocked: isAspectLocked(this.aspect) }
    )
    this.setCursor(getHandleCursorStyle(mode))
  }

  private replaceRegion(next: CropRect): void {
    if (regionsEqual(next, this.region)) return
    this.region = next
    this.options.onRegionChanging?.(cloneRegion(next))
  }

  private commit(): void {
    this.committed = Object.freeze(cloneRegion(this.region))
    this.options.onRegionChanged?.(cloneRegion(this.region))
  }

  private setCursor(cursor: CursorStyle): void {
    if (cursor === this.cursor) return
    this.cursor = cursor
    this.options.onCursorChange?.(cursor)
  }
}
