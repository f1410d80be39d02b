// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type {
  DisplayState,
  ImageOrigin,
  RoiRef,
} from "./types.js"

/**
 * Kinds of change a roi collection reports through `roiGroupChanged`.
 */
export type RoiGroupChangeType = "add" | "modify" | "reshape" | "remove"

/**
 * Type-safe event map for roi collection notifications.
 *
 * @example
 * ```typescript
 * group.addEventListener('roiSelectionChanged', (event) => {
 *   console.log('Selected:', event.detail.newIndices);
 * });
 * ```
 */
export interface RoiGroupEventMap {
  /** Fired after rois were added, modified, reshaped or removed */
  roiGroupChanged: {
    eventType: RoiGroupChangeType
    /** Indices of the rois concerned, in the order they were touched */
    roiIndices: number[]
  }

  /** Fired when the selection changes; may be empty */
  roiSelectionChanged: {
    newIndices: number[]
  }

  /** Fired when rois are (re)classified */
  roiClassificationChanged: {
    roiIndices: number[]
    classification: number
  }
}

/**
 * Type-safe event map for RoiThumbnailDisplay events.
 */
export interface RoiThumbnailDisplayEventMap {
  /** Fired whenever the display state is replaced */
  stateChange: {
    previous: DisplayState
    current: DisplayState
  }

  /**
   * Fired after an image was drawn for a roi.
   * `width` and `height` are the upsampled display size.
   */
  imageUpdate: {
    roi: RoiRef
    origin: ImageOrigin
    width: number
    height: number
  }
}

/**
 * Type-safe event class for roi collection events.
 */
export class RoiGroupEvent<
  K extends keyof RoiGroupEventMap,
> extends CustomEvent<RoiGroupEventMap[K]> {
  constructor(type: K, detail: RoiGroupEventMap[K]) {
    super(type, { detail })
  }
}

/**
 * Type-safe event class for RoiThumbnailDisplay events.
 */
export class RoiThumbnailDisplayEvent<
  K extends keyof RoiThumbnailDisplayEventMap,
> extends CustomEvent<RoiThumbnailDisplayEventMap[K]> {
  constructor(type: K, detail: RoiThumbnailDisplayEventMap[K]) {
    super(type, { detail })
  }
}

export type RoiGroupEventListener<K extends keyof RoiGroupEventMap> = (
  event: RoiGroupEvent<K>,
) => void

export type RoiThumbnailDisplayEventListener<
  K extends keyof RoiThumbnailDisplayEventMap,
> = (event: RoiThumbnailDisplayEvent<K>) => void

/**
 * Options for addEventListener/removeEventListener.
 * Supports all standard EventTarget options (once, signal, ...).
 */
export type EventListenerOptionsArg = boolean | AddEventListenerOptions
