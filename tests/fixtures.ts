// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { vi } from "vitest";

import type { DisplayImage, FrameStack, Roi, ThumbnailRenderer } from "../src/types.js";

export function image(values: number[], width: number, height: number): DisplayImage {
  return { data: new Float64Array(values), width, height };
}

export function frames(count: number, height = 2, width = 2): FrameStack {
  return {
    data: new Float32Array(count * height * width),
    shape: [count, height, width],
  };
}

export function makeRoi(id: string, storedImage: DisplayImage | null = null): Roi {
  return {
    id,
    boundary: [
      [20, 10],
      [20, 11],
      [21, 11],
      [21, 10],
    ],
    upperLeftCorner: [10, 20],
    storedImage,
  };
}

export function createRenderer() {
  return {
    showImage: vi.fn<ThumbnailRenderer["showImage"]>(),
    showOutline: vi.fn<ThumbnailRenderer["showOutline"]>(),
    showMessage: vi.fn<ThumbnailRenderer["showMessage"]>(),
    setViewBounds: vi.fn<ThumbnailRenderer["setViewBounds"]>(),
    clear: vi.fn<ThumbnailRenderer["clear"]>(),
  } satisfies ThumbnailRenderer;
}
