// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";

import { RasterRenderer } from "../src/RasterRenderer.js";
import { RoiGroup } from "../src/RoiGroup.js";
import { RoiThumbnailDisplay } from "../src/RoiThumbnailDisplay.js";
import { image, makeRoi } from "./fixtures.js";

function pixel(rgba: Uint8ClampedArray | null, width: number, col: number, row: number): number[] {
  if (!rgba) throw new Error("nothing composited");
  const o = (row * width + col) * 4;
  return Array.from(rgba.slice(o, o + 4));
}

describe("RasterRenderer", () => {
  it("composites nothing before an image or view bounds arrive", () => {
    expect(new RasterRenderer().composite()).toBeNull();
  });

  it("maps the image through the color range to gray", () => {
    const renderer = new RasterRenderer();
    renderer.showImage(image([0, 10, 5, 10], 2, 2), [0, 10]);
    renderer.setViewBounds(2, 2, [0, 10]);

    const rgba = renderer.composite();

    expect(pixel(rgba, 2, 0, 0)).toEqual([0, 0, 0, 255]);
    expect(pixel(rgba, 2, 1, 0)).toEqual([255, 255, 255, 255]);
    expect(pixel(rgba, 2, 0, 1)).toEqual([128, 128, 128, 255]);
  });

  it("uses the color range from the view bounds", () => {
    const renderer = new RasterRenderer();
    renderer.showImage(image([5], 1, 1), [0, 10]);
    renderer.setViewBounds(1, 1, [5, 6]);

    expect(pixel(renderer.composite(), 1, 0, 0)).toEqual([0, 0, 0, 255]);
  });

  it("draws the outline in display coordinates", () => {
    const renderer = new RasterRenderer({ lineColor: [10, 20, 30] });
    renderer.setViewBounds(4, 4, [0, 1]);
    renderer.showOutline([
      [1, 1],
      [4, 1],
    ]);

    const rgba = renderer.composite();

    expect(pixel(rgba, 4, 0, 0)).toEqual([10, 20, 30, 255]);
    expect(pixel(rgba, 4, 3, 0)).toEqual([10, 20, 30, 255]);
    expect(pixel(rgba, 4, 0, 1)).toEqual([0, 0, 0, 255]);
  });

  it("skips NaN outlines", () => {
    const renderer = new RasterRenderer({ backgroundColor: [1, 2, 3] });
    renderer.setViewBounds(2, 2, [0, 1]);
    renderer.showOutline([[NaN, NaN]]);

    const rgba = renderer.composite();

    expect(pixel(rgba, 2, 0, 0)).toEqual([1, 2, 3, 255]);
    expect(pixel(rgba, 2, 1, 1)).toEqual([1, 2, 3, 255]);
  });

  it("clear removes the image but keeps the view", () => {
    const renderer = new RasterRenderer();
    renderer.showImage(image([10], 1, 1), [0, 10]);
    renderer.setViewBounds(1, 1, [0, 10]);

    renderer.clear();

    expect(renderer.hasImage).toBe(false);
    expect(pixel(renderer.composite(), 1, 0, 0)).toEqual([0, 0, 0, 255]);
  });

  it("renders a selected roi through the display", () => {
    const group = new RoiGroup([makeRoi("roi-0", image([1, 2, 3, 4], 2, 2))]);
    const renderer = new RasterRenderer({ lineColor: [255, 0, 0] });
    const display = new RoiThumbnailDisplay({
      roiGroup: group,
      renderer,
      generateThumbnail: () => null,
    });

    display.onSelectionChanged({ newIndices: [0] });
    const rgba = renderer.composite();

    expect(renderer.message).toBe("");
    expect(renderer.viewSize).toEqual([8, 8]);
    expect(rgba?.length).toBe(8 * 8 * 4);
    // Outline vertex (4, 4) covers pixel (3, 3)
    expect(pixel(rgba, 8, 3, 3)).toEqual([255, 0, 0, 255]);
    // Inside the bottom-right block, which holds the maximum sample
    expect(pixel(rgba, 8, 5, 5)).toEqual([255, 255, 255, 255]);

    display.onSelectionChanged({ newIndices: [] });

    expect(renderer.message).toBe("No roi selected");
    expect(renderer.hasImage).toBe(false);
  });
});
