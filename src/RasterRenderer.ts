// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { normalizeToUint8 } from "./normalize.js"
import type {
  BoundaryPoints,
  DisplayImage,
  DisplayRange,
  ThumbnailRenderer,
} from "./types.js"

export interface RasterRendererOptions {
  /** Outline color as [r, g, b] (default: [255, 221, 0]) */
  lineColor?: [number, number, number]
  /** Background color as [r, g, b] (default: [0, 0, 0]) */
  backgroundColor?: [number, number, number]
}

/**
 * Off-screen thumbnail renderer.
 *
 * Keeps the latest image, outline and message, and composites image and
 * outline into an RGBA buffer on demand. The buffer can be wrapped in an
 * `ImageData` and put on a canvas.
 *
 * Display coordinates follow image-axis convention: pixel (col, row)
 * covers [col + 0.5, col + 1.5) x [row + 0.5, row + 1.5), so the view of
 * a `width` x `height` image spans [0.5, width + 0.5] on x.
 */
export class RasterRenderer implements ThumbnailRenderer {
  private readonly lineColor: [number, number, number]
  private readonly backgroundColor: [number, number, number]

  private image: DisplayImage | null = null
  private imageRange: DisplayRange = [0, 255]
  private colorRange: DisplayRange | null = null
  private outline: BoundaryPoints = []
  private _message = ""
  private viewWidth = 0
  private viewHeight = 0

  constructor(options: RasterRendererOptions = {}) {
    this.lineColor = options.lineColor ?? [255, 221, 0]
    this.backgroundColor = options.backgroundColor ?? [0, 0, 0]
  }

  /** Message currently shown, empty when hidden. */
  get message(): string {
    return this._message
  }

  /** Outline currently shown. */
  get outlinePoints(): BoundaryPoints {
    return this.outline
  }

  /** View size as [width, height]. */
  get viewSize(): [number, number] {
    return [this.viewWidth, this.viewHeight]
  }

  get hasImage(): boolean {
    return this.image !== null
  }

  showImage(pixels: DisplayImage, displayRange: DisplayRange): void {
    this.image = pixels
    this.imageRange = displayRange
    this.colorRange = null
    if (this.viewWidth === 0 && this.viewHeight === 0) {
      this.viewWidth = pixels.width
      this.viewHeight = pixels.height
    }
  }

  showOutline(points: BoundaryPoints): void {
    this.outline = points
  }

  showMessage(text: string): void {
    this._message = text
  }

  setViewBounds(width: number, height: number, colorRange: DisplayRange): void {
    this.viewWidth = width
    this.viewHeight = height
    this.colorRange = colorRange
  }

  clear(): void {
    this.image = null
  }

  /**
   * Composite the current image and outline.
   *
   * @returns RGBA buffer of the view size, or `null` for an empty view
   */
  composite(): Uint8ClampedArray | null {
    const width = this.viewWidth
    const height = this.viewHeight
    if (width === 0 || height === 0) return null

    const rgba = new Uint8ClampedArray(width * height * 4)
    const [br, bg, bb] = this.backgroundColor
    for (let i = 0; i < width * height; i++) {
      rgba[i * 4] = br
      rgba[i * 4 + 1] = bg
      rgba[i * 4 + 2] = bb
      rgba[i * 4 + 3] = 255
    }

    const image = this.image
    if (image) {
      const gray = normalizeToUint8(image.data, this.colorRange ?? this.imageRange)
      const rows = Math.min(height, image.height)
      const cols = Math.min(width, image.width)
      for (let y = 0; y < rows; y++) {
        for (let x = 0; x < cols; x++) {
          const value = gray[y * image.width + x]
          const o = (y * width + x) * 4
          rgba[o] = value
          rgba[o + 1] = value
          rgba[o + 2] = value
        }
      }
    }

    const points = this.outline
    for (let i = 0; i < points.length; i++) {
      const from = points[i]
      const to = points[(i + 1) % points.length]
      this.drawSegment(rgba, from, to)
    }

    return rgba
  }

  /** Draw a line between two display points; segments with NaN are skipped. */
  private drawSegment(
    rgba: Uint8ClampedArray,
    from: [number, number],
    to: [number, number],
  ): void {
    if (from.some(Number.isNaN) || to.some(Number.isNaN)) return

    const dx = to[0] - from[0]
    const dy = to[1] - from[1]
    const steps = Math.max(1, Math.ceil(Math.max(Math.abs(dx), Math.abs(dy))))
    const [r, g, b] = this.lineColor

    for (let s = 0; s <= steps; s++) {
      const col = Math.round(from[0] + (dx * s) / steps) - 1
      const row = Math.round(from[1] + (dy * s) / steps) - 1
      if (col < 0 || row < 0 || col >= this.viewWidth || row >= this.viewHeight) {
        continue
      }
      const o = (row * this.viewWidth + col) * 4
      rgba[o] = r
      rgba[o + 1] = g
      rgba[o + 2] = b
    }
  }
}
