// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * roi-thumbnail
 *
 * A display that shows a zoomed thumbnail of the selected region of
 * interest, with its outline, and follows a roi collection's changes.
 *
 * @example
 * ```typescript
 * import { RoiGroup, RoiThumbnailDisplay, RasterRenderer, attachRoiDisplay } from 'roi-thumbnail';
 *
 * const group = new RoiGroup(rois);
 * const renderer = new RasterRenderer();
 * const display = new RoiThumbnailDisplay({
 *   roiGroup: group,
 *   renderer,
 *   generateThumbnail: computeRoiThumbnail,
 * });
 * attachRoiDisplay(display, group);
 *
 * group.select([2]);
 * const rgba = renderer.composite();
 * ```
 */

// Main class
export {
  RoiThumbnailDisplay,
  NO_ROI_SELECTED_MESSAGE,
  IMAGE_NOT_AVAILABLE_MESSAGE,
} from "./RoiThumbnailDisplay.js"

// Display capability
export { attachRoiDisplay, unsupported } from "./RoiDisplay.js"
export type { RoiDisplay } from "./RoiDisplay.js"

// Collection
export { RoiGroup } from "./RoiGroup.js"

// Image resolution
export { ImageCache, DEFAULT_MAX_CACHE_ENTRIES } from "./ImageCache.js"
export {
  ImageResolver,
  DEFAULT_MIN_FRAME_COUNT,
  INSUFFICIENT_FRAMES_NOTICE,
} from "./ImageResolver.js"
export type { ImageResolverOptions, ResolveResult } from "./ImageResolver.js"

// Frame sources
export {
  ZarrFrameSource,
  DEFAULT_MAX_RESIDENT_FRAMES,
} from "./ZarrFrameSource.js"
export type { ZarrFrameSourceOptions } from "./ZarrFrameSource.js"

// Rendering
export { RasterRenderer } from "./RasterRenderer.js"
export type { RasterRendererOptions } from "./RasterRenderer.js"
export { computeDisplayRange, normalizeToUint8 } from "./normalize.js"

// Coordinate and upsampling utilities
export {
  createBoundaryTransform,
  mapBoundary,
  unmapBoundary,
  hiddenBoundary,
} from "./utils/coordinates.js"
export {
  upsampleImage,
  upsampleNearestNeighbor,
  upsampleBilinear,
  DEFAULT_UPSAMPLE_FACTOR,
} from "./utils/upsample.js"

// Types
export type {
  BoundaryPoints,
  Dashboard,
  DisplayImage,
  DisplayPoint,
  DisplayRange,
  DisplayState,
  FrameStack,
  ImageOrigin,
  RawDataSource,
  Roi,
  RoiCollection,
  RoiRef,
  RoiThumbnailDisplayOptions,
  ThumbnailGenerator,
  ThumbnailRenderer,
  TypedArray,
  UnavailableReason,
  UnsupportedResult,
  UpsampleInterpolation,
} from "./types.js"
export { isEmptyImage, isTypedArray } from "./types.js"

// Event system (browser-native EventTarget API)
export { RoiGroupEvent, RoiThumbnailDisplayEvent } from "./events.js"
export type {
  RoiGroupChangeType,
  RoiGroupEventMap,
  RoiGroupEventListener,
  RoiThumbnailDisplayEventMap,
  RoiThumbnailDisplayEventListener,
  EventListenerOptionsArg,
} from "./events.js"
