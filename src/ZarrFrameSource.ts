// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Raw frame source backed by a Zarr array with axes [t, y, x].
 *
 * Frames are pulled into memory with {@link ZarrFrameSource.loadFrames}.
 * The thumbnail display only ever calls `getFrameSet("cache")`, which
 * returns a copy of the resident frames synchronously and never touches
 * the store.
 */

import * as zarr from "zarrita"

import type { FrameStack, RawDataSource } from "./types.js"
import { isTypedArray } from "./types.js"

/** Default upper bound on resident frames. */
export const DEFAULT_MAX_RESIDENT_FRAMES = 1000

export interface ZarrFrameSourceOptions {
  /** Maximum number of frames kept in memory (default: 1000) */
  maxResidentFrames?: number
}

export class ZarrFrameSource implements RawDataSource {
  private readonly array: zarr.Array<zarr.DataType, zarr.Readable>
  private readonly maxResidentFrames: number
  private resident: FrameStack | null = null
  private residentStart = 0
  /** Incremented per load; only the latest load may replace the cache. */
  private loadGeneration = 0

  constructor(
    array: zarr.Array<zarr.DataType, zarr.Readable>,
    options: ZarrFrameSourceOptions = {},
  ) {
    if (array.shape.length !== 3) {
      throw new Error(
        `Expected a 3D [t, y, x] array, got shape [${array.shape.join(", ")}]`,
      )
    }
    this.array = array
    this.maxResidentFrames =
      options.maxResidentFrames ?? DEFAULT_MAX_RESIDENT_FRAMES
    if (!Number.isInteger(this.maxResidentFrames) || this.maxResidentFrames < 1) {
      throw new Error(
        `Invalid maxResidentFrames: ${this.maxResidentFrames}. Must be a positive integer.`,
      )
    }
  }

  /**
   * Open the array at `path` in `store`.
   *
   * @example
   * ```typescript
   * const source = await ZarrFrameSource.open(new zarr.FetchStore(url), "/frames")
   * await source.loadFrames(0, 500)
   * ```
   */
  static async open(
    store: zarr.Readable,
    path = "/",
    options: ZarrFrameSourceOptions = {},
  ): Promise<ZarrFrameSource> {
    const location = zarr.root(store).resolve(path)
    const array = await zarr.open(location, { kind: "array" })
    return new ZarrFrameSource(array, options)
  }

  /** Total number of frames in the array. */
  get frameCount(): number {
    return this.array.shape[0]
  }

  /** Frame size as [height, width]. */
  get frameShape(): [number, number] {
    return [this.array.shape[1], this.array.shape[2]]
  }

  /** Number of frames currently held in memory. */
  get residentFrameCount(): number {
    return this.resident?.shape[0] ?? 0
  }

  /** Index of the first resident frame. */
  get residentFrameStart(): number {
    return this.residentStart
  }

  /**
   * Read frames [start, end) into memory, replacing what was resident.
   * The range is clamped to the array and to `maxResidentFrames`.
   *
   * @returns Number of frames now resident
   */
  async loadFrames(start = 0, end?: number): Promise<number> {
    const first = Math.max(0, Math.min(Math.floor(start), this.frameCount))
    const requestedEnd = end ?? this.frameCount
    const last = Math.min(
      Math.max(first, Math.floor(requestedEnd)),
      this.frameCount,
      first + this.maxResidentFrames,
    )

    const generation = ++this.loadGeneration
    if (last === first) {
      this.resident = null
      this.residentStart = first
      return 0
    }

    const chunk = await zarr.get(this.array, [zarr.slice(first, last), null, null])
    if (!isTypedArray(chunk.data)) {
      throw new Error(`Unsupported frame dtype: ${this.array.dtype}`)
    }

    // A newer load started while this one was reading
    if (generation !== this.loadGeneration) {
      return this.residentFrameCount
    }

    const [, height, width] = this.array.shape
    this.resident = { data: chunk.data, shape: [last - first, height, width] }
    this.residentStart = first
    return last - first
  }

  getFrameSet(mode: "cache"): FrameStack | null {
    if (mode !== "cache") {
      throw new Error(`Unsupported frame set mode: ${String(mode)}`)
    }
    if (!this.resident) return null
    const [count, height, width] = this.resident.shape
    return { data: this.resident.data.slice(), shape: [count, height, width] }
  }

  /** Drop all resident frames. */
  clear(): void {
    this.loadGeneration++
    this.resident = null
    this.residentStart = 0
  }
}
