// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import {
  type EventListenerOptionsArg,
  RoiGroupEvent,
  type RoiGroupEventListener,
  type RoiGroupEventMap,
} from "./events.js"
import type { DisplayImage, Roi, RoiCollection } from "./types.js"

/**
 * In-memory roi collection that reports its changes as typed events.
 *
 * Every mutation emits exactly one `roiGroupChanged` event carrying the
 * indices it touched. Selection and classification changes have their
 * own events.
 *
 * @example
 * ```typescript
 * const group = new RoiGroup([roiA, roiB])
 * group.addEventListener('roiSelectionChanged', (event) => {
 *   console.log(event.detail.newIndices)
 * })
 * group.select([1])
 * ```
 */
export class RoiGroup implements RoiCollection {
  private readonly _rois: Roi[]
  private _selectedIndices: number[] = []
  private readonly _eventTarget = new EventTarget()

  constructor(rois: Roi[] = []) {
    this._rois = [...rois]
  }

  get count(): number {
    return this._rois.length
  }

  get selectedIndices(): number[] {
    return [...this._selectedIndices]
  }

  getRoi(index: number): Roi | undefined {
    if (!Number.isInteger(index)) return undefined
    return this._rois[index]
  }

  /**
   * Append rois to the collection.
   * @returns Indices of the added rois
   */
  addRois(rois: Roi[]): number[] {
    const start = this._rois.length
    this._rois.push(...rois)
    const indices = rois.map((_, i) => start + i)
    this._emitEvent("roiGroupChanged", { eventType: "add", roiIndices: indices })
    return indices
  }

  /**
   * Replace the stored thumbnail of a roi.
   */
  setRoiImage(index: number, image: DisplayImage | null): void {
    const roi = this.requireRoi(index)
    roi.storedImage = image
    this._emitEvent("roiGroupChanged", {
      eventType: "modify",
      roiIndices: [index],
    })
  }

  /**
   * Move a roi by (dx, dy) pixels. The stored thumbnail is kept.
   */
  translateRoi(index: number, dx: number, dy: number): void {
    const roi = this.requireRoi(index)
    roi.boundary = roi.boundary.map(([row, col]): [number, number] => [row + dy, col + dx])
    roi.upperLeftCorner = [roi.upperLeftCorner[0] + dx, roi.upperLeftCorner[1] + dy]
    this._emitEvent("roiGroupChanged", {
      eventType: "modify",
      roiIndices: [index],
    })
  }

  /**
   * Give a roi a new outline. Its stored thumbnail no longer matches the
   * shape and is dropped.
   */
  reshapeRoi(
    index: number,
    boundary: Array<[number, number]>,
    upperLeftCorner: [number, number],
  ): void {
    const roi = this.requireRoi(index)
    roi.boundary = boundary
    roi.upperLeftCorner = upperLeftCorner
    roi.storedImage = null
    this._emitEvent("roiGroupChanged", {
      eventType: "reshape",
      roiIndices: [index],
    })
  }

  /**
   * Remove rois. Selected rois that are removed leave the selection, and
   * remaining selected indices are shifted down accordingly.
   */
  removeRois(indices: number[]): void {
    const removed = new Set(indices)
    for (const index of removed) {
      this.requireRoi(index)
    }

    const remap = new Map<number, number>()
    let next = 0
    for (let i = 0; i < this._rois.length; i++) {
      if (!removed.has(i)) remap.set(i, next++)
    }
    const kept = this._rois.filter((_, i) => !removed.has(i))
    this._rois.splice(0, this._rois.length, ...kept)

    this._emitEvent("roiGroupChanged", {
      eventType: "remove",
      roiIndices: [...indices],
    })

    const previous = this._selectedIndices
    const selection = previous.flatMap((i) => {
      const mapped = remap.get(i)
      return mapped === undefined ? [] : [mapped]
    })
    const unchanged =
      selection.length === previous.length &&
      selection.every((value, i) => value === previous[i])
    if (!unchanged) {
      this.select(selection)
    }
  }

  /**
   * Replace the selection. The last index is the most recently selected.
   */
  select(indices: number[]): void {
    for (const index of indices) {
      this.requireRoi(index)
    }
    this._selectedIndices = [...indices]
    this._emitEvent("roiSelectionChanged", { newIndices: [...indices] })
  }

  classifyRois(indices: number[], classification: number): void {
    for (const index of indices) {
      this.requireRoi(index).classification = classification
    }
    this._emitEvent("roiClassificationChanged", {
      roiIndices: [...indices],
      classification,
    })
  }

  addEventListener<K extends keyof RoiGroupEventMap>(
    type: K,
    listener: RoiGroupEventListener<K>,
    options?: EventListenerOptionsArg,
  ): void {
    this._eventTarget.addEventListener(type, listener as EventListener, options)
  }

  removeEventListener<K extends keyof RoiGroupEventMap>(
    type: K,
    listener: RoiGroupEventListener<K>,
    options?: EventListenerOptionsArg,
  ): void {
    this._eventTarget.removeEventListener(
      type,
      listener as EventListener,
      options,
    )
  }

  private requireRoi(index: number): Roi {
    const roi = this.getRoi(index)
    if (!roi) {
      throw new Error(
        `Roi index ${index} is out of range for a group of ${this._rois.length} rois`,
      )
    }
    return roi
  }

  private _emitEvent<K extends keyof RoiGroupEventMap>(
    eventName: K,
    detail: RoiGroupEventMap[K],
  ): void {
    try {
      this._eventTarget.dispatchEvent(new RoiGroupEvent(eventName, detail))
    } catch (error) {
      console.error(`[roi-thumbnail] Error in ${eventName} event listener:`, error)
    }
  }
}
