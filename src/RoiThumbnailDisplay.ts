// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import {
  type EventListenerOptionsArg,
  type RoiGroupEventMap,
  RoiThumbnailDisplayEvent,
  type RoiThumbnailDisplayEventListener,
  type RoiThumbnailDisplayEventMap,
} from "./events.js"
import { DEFAULT_MAX_CACHE_ENTRIES, ImageCache } from "./ImageCache.js"
import { ImageResolver } from "./ImageResolver.js"
import { computeDisplayRange } from "./normalize.js"
import { type RoiDisplay, unsupported } from "./RoiDisplay.js"
import type {
  DisplayImage,
  DisplayState,
  ImageOrigin,
  RawDataSource,
  Roi,
  RoiCollection,
  RoiRef,
  RoiThumbnailDisplayOptions,
  ThumbnailRenderer,
  UnsupportedResult,
  UpsampleInterpolation,
} from "./types.js"
import { hiddenBoundary, mapBoundary } from "./utils/coordinates.js"
import {
  assertIntegerUpsampleFactor,
  DEFAULT_UPSAMPLE_FACTOR,
  upsampleImage,
} from "./utils/upsample.js"

/** Message shown while nothing is selected. */
export const NO_ROI_SELECTED_MESSAGE = "No roi selected"

/** Prefix of the message shown when no image can be resolved. */
export const IMAGE_NOT_AVAILABLE_MESSAGE = "Image not available"

const EMPTY_STATE: DisplayState = Object.freeze({ kind: "empty" })

/**
 * Shows a zoomed thumbnail of the selected roi with its outline on top.
 *
 * The display follows a roi collection's notifications:
 * - a selection change shows the last selected roi, or nothing
 * - a `modify`/`reshape` of the shown roi drops its cached image and
 *   redraws it
 * - everything else is ignored
 *
 * Handlers run synchronously to completion. Missing images are never an
 * error: the display shows a message instead. The display never changes
 * the collection.
 *
 * @example
 * ```typescript
 * const display = new RoiThumbnailDisplay({
 *   roiGroup: group,
 *   renderer: new RasterRenderer(),
 *   generateThumbnail: computeRoiThumbnail,
 *   frameSource,
 * });
 * const detach = attachRoiDisplay(display, group);
 * ```
 */
export class RoiThumbnailDisplay implements RoiDisplay {
  private readonly roiGroup: RoiCollection
  private readonly renderer: ThumbnailRenderer
  private readonly cache: ImageCache
  private readonly resolver: ImageResolver
  private readonly upsampleFactor: number
  private readonly interpolation: UpsampleInterpolation

  private _state: DisplayState = EMPTY_STATE

  /** Event target for display events */
  private readonly _eventTarget = new EventTarget()

  constructor(options: RoiThumbnailDisplayOptions) {
    this.roiGroup = options.roiGroup
    this.renderer = options.renderer
    this.upsampleFactor = options.upsampleFactor ?? DEFAULT_UPSAMPLE_FACTOR
    this.interpolation = options.interpolation ?? "nearest"
    assertIntegerUpsampleFactor(this.upsampleFactor)

    this.cache = new ImageCache(
      options.maxCacheEntries ?? DEFAULT_MAX_CACHE_ENTRIES,
    )
    this.resolver = new ImageResolver({
      cache: this.cache,
      generateThumbnail: options.generateThumbnail,
      frameSource: options.frameSource,
      dashboard: options.dashboard,
      minFrameCount: options.minFrameCount,
    })
  }

  /** What the display currently shows. The returned state is frozen. */
  get state(): DisplayState {
    return this._state
  }

  /** Cache of resolved roi images. */
  get imageCache(): ImageCache {
    return this.cache
  }

  /** Resolver used for every redraw. */
  get imageResolver(): ImageResolver {
    return this.resolver
  }

  /**
   * Replace the raw frame source used to generate missing thumbnails.
   * Cached images are kept; the current view is not redrawn.
   */
  setFrameSource(source: RawDataSource | null): void {
    this.resolver.frameSource = source
  }

  // ============================================================
  // Collection notifications
  // ============================================================

  onCollectionChanged(event: RoiGroupEventMap["roiGroupChanged"]): void {
    if (event.eventType !== "modify" && event.eventType !== "reshape") {
      return
    }
    if (event.roiIndices.length === 0) {
      return
    }

    // Every changed roi loses its cached image, shown or not
    for (const index of event.roiIndices) {
      const changed = this.roiGroup.getRoi(index)
      if (changed) this.cache.invalidate(changed.id)
    }

    const roiIndex = event.roiIndices[event.roiIndices.length - 1]
    const shown = this.shownRoi()
    if (!shown || shown.index !== roiIndex) {
      return
    }

    this.showRoi(this.requireRoi(roiIndex), roiIndex)
  }

  onSelectionChanged(event: RoiGroupEventMap["roiSelectionChanged"]): void {
    if (event.newIndices.length === 0) {
      this.resetImageDisplay()
      this.renderer.showMessage(NO_ROI_SELECTED_MESSAGE)
      this.setState(EMPTY_STATE)
      return
    }

    const roiIndex = event.newIndices[event.newIndices.length - 1]
    this.showRoi(this.requireRoi(roiIndex), roiIndex)
  }

  onClassificationChanged(
    _event: RoiGroupEventMap["roiClassificationChanged"],
  ): void {
    // Classification does not change the thumbnail
  }

  addRois(..._args: unknown[]): UnsupportedResult {
    return unsupported("addRois", "RoiThumbnailDisplay")
  }

  removeRois(..._args: unknown[]): UnsupportedResult {
    return unsupported("removeRois", "RoiThumbnailDisplay")
  }

  // ============================================================
  // Rendering
  // ============================================================

  private shownRoi(): Readonly<RoiRef> | null {
    return this._state.kind === "empty" ? null : this._state.roi
  }

  private requireRoi(index: number): Roi {
    const roi = this.roiGroup.getRoi(index)
    if (!roi) {
      throw new Error(
        `Roi index ${index} does not exist in a collection of ${this.roiGroup.count} rois`,
      )
    }
    return roi
  }

  private showRoi(roi: Roi, index: number): void {
    const ref: RoiRef = { id: roi.id, index }
    const result = this.resolver.resolve(roi)

    if (result.ok) {
      this.updateImageDisplay(roi, ref, result.image, result.origin)
      this.setState({ kind: "showingImage", roi: ref })
    } else {
      this.showUnavailable(result.message)
      this.setState({ kind: "showingUnavailable", roi: ref, reason: result.reason })
    }
  }

  private updateImageDisplay(
    roi: Roi,
    ref: RoiRef,
    image: DisplayImage,
    origin: ImageOrigin,
  ): void {
    const upsampled = upsampleImage(image, this.upsampleFactor, this.interpolation)
    const outline = mapBoundary(roi, this.upsampleFactor)
    const colorRange = computeDisplayRange(upsampled.data)

    this.renderer.showImage(upsampled, colorRange)
    this.renderer.showOutline(outline)
    this.renderer.setViewBounds(upsampled.width, upsampled.height, colorRange)
    this.renderer.showMessage("")

    this._emitEvent("imageUpdate", {
      roi: ref,
      origin,
      width: upsampled.width,
      height: upsampled.height,
    })
  }

  private showUnavailable(message: string): void {
    this.resetImageDisplay()
    this.renderer.showMessage(`${IMAGE_NOT_AVAILABLE_MESSAGE}: ${message}`)
  }

  private resetImageDisplay(): void {
    this.renderer.clear()
    this.renderer.showOutline(hiddenBoundary())
  }

  private setState(next: DisplayState): void {
    const previous = this._state
    if (next.kind !== "empty") Object.freeze(next.roi)
    this._state = Object.freeze(next)
    this._emitEvent("stateChange", { previous, current: next })
  }

  // ============================================================
  // Event System (Browser-native EventTarget API)
  // ============================================================

  /**
   * Add a type-safe event listener for RoiThumbnailDisplay events.
   *
   * @example
   * ```typescript
   * display.addEventListener('stateChange', (event) => {
   *   console.log('Now showing:', event.detail.current.kind);
   * });
   * ```
   */
  addEventListener<K extends keyof RoiThumbnailDisplayEventMap>(
    type: K,
    listener: RoiThumbnailDisplayEventListener<K>,
    options?: EventListenerOptionsArg,
  ): void {
    this._eventTarget.addEventListener(type, listener as EventListener, options)
  }

  removeEventListener<K extends keyof RoiThumbnailDisplayEventMap>(
    type: K,
    listener: RoiThumbnailDisplayEventListener<K>,
    options?: EventListenerOptionsArg,
  ): void {
    this._eventTarget.removeEventListener(
      type,
      listener as EventListener,
      options,
    )
  }

  /**
   * Internal helper to emit events.
   * Catches and logs any errors from event listeners to prevent breaking execution.
   */
  private _emitEvent<K extends keyof RoiThumbnailDisplayEventMap>(
    eventName: K,
    detail: RoiThumbnailDisplayEventMap[K],
  ): void {
    try {
      const event = new RoiThumbnailDisplayEvent(eventName, detail)
      this._eventTarget.dispatchEvent(event)
    } catch (error) {
      console.error(`[roi-thumbnail] Error in ${eventName} event listener:`, error)
    }
  }
}
