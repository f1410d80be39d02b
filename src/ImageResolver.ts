// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type { ImageCache } from "./ImageCache.js"
import type {
  Dashboard,
  DisplayImage,
  ImageOrigin,
  RawDataSource,
  Roi,
  ThumbnailGenerator,
  UnavailableReason,
} from "./types.js"
import { isEmptyImage } from "./types.js"

/** Default minimum number of resident frames needed to generate a thumbnail. */
export const DEFAULT_MIN_FRAME_COUNT = 100

/** Dashboard notice shown the first time generation lacks frames. */
export const INSUFFICIENT_FRAMES_NOTICE =
  "Can not update roi image because there are not enough image frames in memory"

const UNAVAILABLE_MESSAGES: Record<UnavailableReason, string> = {
  "no-source-configured": "no image stack configured",
  "insufficient-frames": "not enough frames in memory",
  "generation-failed": "generation failed",
}

/**
 * Result of resolving a display image for a roi.
 */
export type ResolveResult =
  | { ok: true; image: DisplayImage; origin: ImageOrigin }
  | { ok: false; reason: UnavailableReason; message: string }

export interface ImageResolverOptions {
  cache: ImageCache
  generateThumbnail: ThumbnailGenerator
  frameSource?: RawDataSource | null
  dashboard?: Dashboard | null
  minFrameCount?: number
}

function unavailable(reason: UnavailableReason): ResolveResult {
  return { ok: false, reason, message: UNAVAILABLE_MESSAGES[reason] }
}

/**
 * Finds a displayable image for a roi.
 *
 * Lookup order:
 * 1. The cache entry for the roi id
 * 2. The image stored on the roi, if it has any non-zero sample
 * 3. A thumbnail generated from the resident frames of the frame source
 *
 * Generated images are written back to `roi.storedImage`, so the next
 * lookup after an invalidation is served from step 2.
 */
export class ImageResolver {
  private readonly cache: ImageCache
  private readonly generateThumbnail: ThumbnailGenerator
  private readonly dashboard: Dashboard | null
  private readonly minFrameCount: number
  private _frameSource: RawDataSource | null

  /** Latch for the one-time insufficient-frames notice. */
  private insufficientFramesNoticeShown = false

  constructor(options: ImageResolverOptions) {
    this.cache = options.cache
    this.generateThumbnail = options.generateThumbnail
    this._frameSource = options.frameSource ?? null
    this.dashboard = options.dashboard ?? null
    this.minFrameCount = options.minFrameCount ?? DEFAULT_MIN_FRAME_COUNT

    if (!Number.isInteger(this.minFrameCount) || this.minFrameCount < 0) {
      throw new Error(
        `Invalid minFrameCount: ${this.minFrameCount}. Must be a non-negative integer.`,
      )
    }
  }

  get frameSource(): RawDataSource | null {
    return this._frameSource
  }

  set frameSource(source: RawDataSource | null) {
    this._frameSource = source
  }

  resolve(roi: Roi): ResolveResult {
    const cached = this.cache.get(roi.id)
    if (cached) {
      return { ok: true, image: cached, origin: "cache" }
    }

    if (roi.storedImage && !isEmptyImage(roi.storedImage)) {
      this.cache.put(roi.id, roi.storedImage)
      return { ok: true, image: roi.storedImage, origin: "stored" }
    }

    if (!this._frameSource) {
      return unavailable("no-source-configured")
    }

    const frames = this._frameSource.getFrameSet("cache")
    if (!frames || frames.shape[0] < this.minFrameCount) {
      this.noticeInsufficientFrames()
      return unavailable("insufficient-frames")
    }

    let image: DisplayImage | null
    try {
      image = this.generateThumbnail(frames, roi)
    } catch (error) {
      console.warn(
        `[roi-thumbnail] Thumbnail generation threw for roi ${roi.id}:`,
        error,
      )
      image = null
    }
    if (!image || image.data.length === 0) {
      return unavailable("generation-failed")
    }

    roi.storedImage = image
    this.cache.put(roi.id, image)
    return { ok: true, image, origin: "generated" }
  }

  private noticeInsufficientFrames(): void {
    if (this.insufficientFramesNoticeShown) return
    this.insufficientFramesNoticeShown = true
    this.dashboard?.displayMessage(INSUFFICIENT_FRAMES_NOTICE)
  }
}
