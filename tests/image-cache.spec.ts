// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";

import { ImageCache } from "../src/ImageCache.js";
import { image } from "./fixtures.js";

describe("ImageCache", () => {
  it("returns what was put for the same roi id", () => {
    const cache = new ImageCache();
    const thumb = image([1, 2], 2, 1);
    cache.put("roi-1", thumb);

    expect(cache.get("roi-1")).toBe(thumb);
    expect(cache.has("roi-1")).toBe(true);
    expect(cache.get("roi-2")).toBeUndefined();
  });

  it("overwrites the entry on a second put", () => {
    const cache = new ImageCache();
    const second = image([3], 1, 1);
    cache.put("roi-1", image([1], 1, 1));
    cache.put("roi-1", second);

    expect(cache.get("roi-1")).toBe(second);
    expect(cache.size).toBe(1);
  });

  it("invalidate removes only the given id", () => {
    const cache = new ImageCache();
    cache.put("a", image([1], 1, 1));
    cache.put("b", image([2], 1, 1));

    expect(cache.invalidate("a")).toBe(true);
    expect(cache.invalidate("a")).toBe(false);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.has("b")).toBe(true);
  });

  it("clear empties the cache", () => {
    const cache = new ImageCache();
    cache.put("a", image([1], 1, 1));
    cache.clear();

    expect(cache.size).toBe(0);
  });

  it("drops the least recently used entry beyond its bound", () => {
    const cache = new ImageCache(2);
    cache.put("a", image([1], 1, 1));
    cache.put("b", image([2], 1, 1));
    cache.get("a");
    cache.put("c", image([3], 1, 1));

    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
    expect(cache.has("c")).toBe(true);
  });

  it("rejects a non-positive bound", () => {
    expect(() => new ImageCache(0)).toThrow(/Invalid maxCacheEntries/);
  });
});
