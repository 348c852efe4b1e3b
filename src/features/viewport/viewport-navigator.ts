/**
 * Zoom and pan state of the crop editor's scroll window.
 *
 * Three coordinate spaces meet here:
 * - window: relative to the visible scroll window (what pointer events report)
 * - canvas: the scrollable canvas, CANVAS_SCALE_MULTIPLIER times the scaled image
 * - image: source pixels
 *
 * When the canvas is smaller than the window it is centered and cannot scroll.
 */

import type { Point, Size, ViewportTransform } from '../../types/crop'
import { clamp } from '../../shared/utils/math'
import {
  computeCanvasSize,
  createViewportTransform,
  getScaledImageSize,
  toImageSpace,
} from '../crop/coordinate-mapper'

export const MIN_SCALE = 0.1
export const MAX_SCALE = 10.0
export const ZOOM_STEP_BASE = 1.1
/** One notch of a classic mouse wheel */
export const WHEEL_DELTA_PER_STEP = 120
/** Fit-to-window leaves a 5% margin */
export const FIT_MARGIN = 0.95

export interface ViewportState {
  scaleFactor: number
  imageOffset: Point
  panScroll: Point
  userZoomed: boolean
}

export class ViewportNavigator {
  private imageSize: Size | null = null
  private windowSize: Size
  private scale = 1
  private scroll: Point = { x: 0, y: 0 }
  private userZoomed = false
  private panAnchor: { scroll: Point; pointer: Point } | null = null

  constructor(windowSize: Size) {
    this.windowSize = { ...windowSize }
  }

  hasImage(): boolean {
    return this.imageSize !== null
  }

  getImageSize(): Size | null {
    return this.imageSize ? { ...this.imageSize } : null
  }

  getScale(): number {
    return this.scale
  }

  getScroll(): Point {
    return { ...this.scroll }
  }

  isUserZoomed(): boolean {
    return this.userZoomed
  }

  /**
   * Show a new image. The scale refits unless the user zoomed since the previous load;
   * either way the manual-zoom flag is cleared and the view recenters.
   */
  load(imageSize: Size): void {
    this.imageSize = { ...imageSize }
    if (!this.userZoomed) {
      this.scale = this.getFitScale()
    }
    this.userZoomed = false
    this.centerOnImage()
  }

  resizeWindow(windowSize: Size): void {
    this.windowSize = { ...windowSize }
    if (!this.imageSize) return
    if (!this.userZoomed) {
      this.scale = this.getFitScale()
      this.centerOnImage()
    } else {
      this.scrollTo(this.scroll)
    }
  }

  fitToWindow(): void {
    this.userZoomed = false
    this.scale = this.getFitScale()
    this.centerOnImage()
  }

  getFitScale(): number {
    if (!this.imageSize) return 1
    const fit = Math.min(
      this.windowSize.width / this.imageSize.width,
      this.windowSize.height / this.imageSize.height,
      1
    )
    return clamp(fit * FIT_MARGIN, MIN_SCALE, MAX_SCALE)
  }

  /**
   * Wheel zoom anchored at the pointer: the image point under `windowPoint` stays there.
   * Returns false when the scale did not change (already at a limit, or no image).
   */
  zoomAt(windowPoint: Point, wheelDelta: number): boolean {
    if (!this.imageSize) return false
    const factor = ZOOM_STEP_BASE ** (wheelDelta / WHEEL_DELTA_PER_STEP)
    return this.zoomTo(this.scale * factor, windowPoint)
  }

  /** Manual zoom about the window center. */
  setScale(scale: number): boolean {
    return this.zoomTo(scale, { x: this.windowSize.width / 2, y: this.windowSize.height / 2 })
  }

  private zoomTo(scale: number, windowPoint: Point): boolean {
    if (!this.imageSize) return false
    const nextScale = clamp(scale, MIN_SCALE, MAX_SCALE)
    if (nextScale === this.scale) return false

    const anchor = this.windowToImage(windowPoint)
    this.scale = nextScale
    this.userZoomed = true

    const transform = this.getTransform()
    const margin = this.getCanvasMargin()
    this.scrollTo({
      x: anchor.x * transform.scale + transform.offsetX - windowPoint.x + margin.x,
      y: anchor.y * transform.scale + transform.offsetY - windowPoint.y + margin.y,
    })
    return true
  }

  /** Start a pan at a global (screen) pointer position. */
  beginPan(globalPointer: Point): void {
    this.panAnchor = { scroll: this.getScroll(), pointer: { ...globalPointer } }
  }

  /** Scroll opposite to the pointer's travel since beginPan. */
  panTo(globalPointer: Point): void {
    if (!this.panAnchor) return
    this.scrollTo({
      x: this.panAnchor.scroll.x - (globalPointer.x - this.panAnchor.pointer.x),
      y: this.panAnchor.scroll.y - (globalPointer.y - this.panAnchor.pointer.y),
    })
  }

  endPan(): void {
    this.panAnchor = null
  }

  isPanning(): boolean {
    return this.panAnchor !== null
  }

  scrollTo(scroll: Point): void {
    const max = this.getMaxScroll()
    this.scroll = {
      x: clamp(scroll.x, 0, max.x),
      y: clamp(scroll.y, 0, max.y),
    }
  }

  getCanvasSize(): Size {
    if (!this.imageSize) return { width: 0, height: 0 }
    return computeCanvasSize(this.imageSize, this.scale)
  }

  getMaxScroll(): Point {
    const canvas = this.getCanvasSize()
    return {
      x: Math.max(0, canvas.width - this.windowSize.width),
      y: Math.max(0, canvas.height - this.windowSize.height),
    }
  }

  getTransform(): ViewportTransform {
    if (!this.imageSize) return { scale: this.scale, offsetX: 0, offsetY: 0 }
    return createViewportTransform(this.imageSize, this.scale)
  }

  windowToCanvas(point: Point): Point {
    const margin = this.getCanvasMargin()
    return {
      x: point.x - margin.x + this.scroll.x,
      y: point.y - margin.y + this.scroll.y,
    }
  }

  canvasToWindow(point: Point): Point {
    const margin = this.getCanvasMargin()
    return {
      x: point.x + margin.x - this.scroll.x,
      y: point.y + margin.y - this.scroll.y,
    }
  }

  windowToImage(point: Point): Point {
    return toImageSpace(this.windowToCanvas(point), this.getTransform())
  }

  getState(): ViewportState {
    const transform = this.getTransform()
    return {
      scaleFactor: this.scale,
      imageOffset: { x: transform.offsetX, y: transform.offsetY },
      panScroll: this.getScroll(),
      userZoomed: this.userZoomed,
    }
  }

  private getCanvasMargin(): Point {
    const canvas = this.getCanvasSize()
    return {
      x: Math.max(0, (this.windowSize.width - canvas.width) / 2),
      y: Math.max(0, (this.windowSize.height - canvas.height) / 2),
    }
  }

  private centerOnImage(): void {
    if (!this.imageSize) return
    const transform = this.getTransform()
    const scaled = getScaledImageSize(this.imageSize, this.scale)
    const margin = this.getCanvasMargin()
    this.scrollTo({
      x: transform.offsetX + scaled.width / 2 - this.windowSize.width / 2 + margin.x,
      y: transform.offsetY + scaled.height / 2 - this.windowSize.height / 2 + margin.y,
    })
  }
}
