// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Typed array types that can back a display image or frame stack.
 */
export type TypedArray =
  | Uint8Array
  | Uint8ClampedArray
  | Uint16Array
  | Uint32Array
  | Int8Array
  | Int16Array
  | Int32Array
  | Float32Array
  | Float64Array

/**
 * A 2D grid of samples in row-major order.
 */
export interface DisplayImage {
  /** Samples, `width * height` long, row-major */
  data: TypedArray
  /** Number of columns */
  width: number
  /** Number of rows */
  height: number
}

/**
 * A stack of frames in `[t, y, x]` order.
 */
export interface FrameStack {
  data: TypedArray
  /** Shape [frames, height, width] */
  shape: [number, number, number]
}

/**
 * A point in display space, `[x, y]`.
 */
export type DisplayPoint = [number, number]

/**
 * Ordered vertices of a closed polygon in display space.
 */
export type BoundaryPoints = DisplayPoint[]

/**
 * Lower and upper bound of the color scale, `[min, max]`.
 */
export type DisplayRange = [number, number]

/**
 * A region of interest as held by the collection.
 */
export interface Roi {
  /** Stable identity, used as cache key */
  id: string
  /**
   * Closed polygon outlining the roi, as `[row, column]` pairs in
   * source image pixels.
   */
  boundary: Array<[number, number]>
  /** Upper-left corner of the roi bounding box, `[x, y]` */
  upperLeftCorner: [number, number]
  /**
   * Thumbnail image stored on the roi. `null`, zero-length and all-zero
   * images count as missing.
   */
  storedImage: DisplayImage | null
  /** Classification label; does not affect the thumbnail */
  classification?: number
}

/**
 * Identity plus position of a roi within its collection.
 */
export interface RoiRef {
  id: string
  index: number
}

/**
 * Why no image could be resolved for a roi.
 */
export type UnavailableReason =
  | "no-source-configured"
  | "insufficient-frames"
  | "generation-failed"

/**
 * Where a resolved image came from.
 */
export type ImageOrigin = "cache" | "stored" | "generated"

/**
 * What the thumbnail display currently shows.
 */
export type DisplayState =
  | { readonly kind: "empty" }
  | { readonly kind: "showingImage"; readonly roi: Readonly<RoiRef> }
  | {
      readonly kind: "showingUnavailable"
      readonly roi: Readonly<RoiRef>
      readonly reason: UnavailableReason
    }

/**
 * Outcome of a collection mutation that a display refuses to perform.
 */
export interface UnsupportedResult {
  ok: false
  kind: "unsupported"
  operation: "addRois" | "removeRois"
  message: string
}

/**
 * Provider of raw imaging frames.
 *
 * `getFrameSet("cache")` returns only frames already resident in memory
 * and must not trigger any I/O. `null` means nothing is resident. The
 * caller owns the returned stack and may write to it.
 */
export interface RawDataSource {
  getFrameSet(mode: "cache"): FrameStack | null
}

/**
 * Computes a thumbnail image for a roi from a frame stack.
 * Returns `null` when no image can be produced.
 */
export type ThumbnailGenerator = (
  frames: FrameStack,
  roi: Roi,
) => DisplayImage | null

/**
 * Channel for user-facing notices outside the thumbnail itself.
 */
export interface Dashboard {
  displayMessage(text: string): void
}

/**
 * Drawing surface used by the thumbnail display.
 *
 * Every value handed to a renderer is a copy; renderers may keep it.
 */
export interface ThumbnailRenderer {
  /** Draw the image, scaled to `displayRange` */
  showImage(pixels: DisplayImage, displayRange: DisplayRange): void
  /** Draw the roi outline; NaN coordinates hide it */
  showOutline(points: BoundaryPoints): void
  /** Show a centered message; an empty string hides it */
  showMessage(text: string): void
  /**
   * Set axis limits to cover `width` x `height` display pixels and the
   * color limits to `colorRange`.
   */
  setViewBounds(width: number, height: number, colorRange: DisplayRange): void
  /** Remove the image */
  clear(): void
}

/**
 * Read access to a roi collection.
 */
export interface RoiCollection {
  /** Number of rois */
  readonly count: number
  /** Roi at `index`, or `undefined` if out of range */
  getRoi(index: number): Roi | undefined
}

/**
 * Interpolation used when upsampling the thumbnail.
 */
export type UpsampleInterpolation = "nearest" | "bilinear"

/**
 * Options for creating a RoiThumbnailDisplay.
 */
export interface RoiThumbnailDisplayOptions {
  /** Collection the display reads rois from */
  roiGroup: RoiCollection
  /** Drawing surface */
  renderer: ThumbnailRenderer
  /** Computes thumbnails from raw frames when a roi has none */
  generateThumbnail: ThumbnailGenerator
  /** Raw frame provider used for thumbnail generation (optional) */
  frameSource?: RawDataSource | null
  /** Receives the one-time "not enough frames" warning (optional) */
  dashboard?: Dashboard | null
  /** Integer scale applied to thumbnails (default: 4) */
  upsampleFactor?: number
  /** Interpolation used for upsampling (default: "nearest") */
  interpolation?: UpsampleInterpolation
  /** Minimum resident frames needed for generation (default: 100) */
  minFrameCount?: number
  /** Upper bound on cached images (default: 256) */
  maxCacheEntries?: number
}

/**
 * Check whether a value is a numeric typed array usable as sample data.
 */
export function isTypedArray(value: unknown): value is TypedArray {
  return (
    value instanceof Uint8Array ||
    value instanceof Uint8ClampedArray ||
    value instanceof Uint16Array ||
    value instanceof Uint32Array ||
    value instanceof Int8Array ||
    value instanceof Int16Array ||
    value instanceof Int32Array ||
    value instanceof Float32Array ||
    value instanceof Float64Array
  )
}

/**
 * A display image counts as empty when it has no samples or all its
 * samples are zero.
 */
export function isEmptyImage(image: DisplayImage | null | undefined): boolean {
  if (!image || image.data.length === 0) return true
  for (let i = 0; i < image.data.length; i++) {
    if (image.data[i] !== 0) return false
  }
  return true
}
