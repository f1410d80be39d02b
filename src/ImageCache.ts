// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { LRUCache } from "lru-cache";

import type { DisplayImage } from "./types.js";

/** Default upper bound on cached roi images. */
export const DEFAULT_MAX_CACHE_ENTRIES = 256;

/**
 * Holds the most recently resolved display image per roi id.
 *
 * Entries live until they are invalidated. The LRU bound only exists to
 * cap memory if a collection cycles through very many rois; a single
 * display only ever needs the entry of the roi it shows.
 */
export class ImageCache {
  private readonly cache: LRUCache<string, DisplayImage>;

  constructor(maxEntries = DEFAULT_MAX_CACHE_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error(
        `Invalid maxCacheEntries: ${maxEntries}. Must be a positive integer.`
      );
    }
    this.cache = new LRUCache<string, DisplayImage>({ max: maxEntries });
  }

  get(roiId: string): DisplayImage | undefined {
    return this.cache.get(roiId);
  }

  has(roiId: string): boolean {
    return this.cache.has(roiId);
  }

  /** Store `image` for `roiId`, replacing any previous entry. */
  put(roiId: string, image: DisplayImage): void {
    this.cache.set(roiId, image);
  }

  /**
   * Drop the entry for `roiId`.
   * @returns True if an entry was removed
   */
  invalidate(roiId: string): boolean {
    return this.cache.delete(roiId);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
