// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type {
  DisplayImage,
  UpsampleInterpolation,
} from "../types.js";

/** Default integer scale for roi thumbnails. */
export const DEFAULT_UPSAMPLE_FACTOR = 4;

/**
 * Validate an integer upsample factor.
 *
 * @throws If the factor is not a positive integer
 */
export function assertIntegerUpsampleFactor(factor: number): void {
  if (!Number.isInteger(factor) || factor < 1) {
    throw new Error(
      `Invalid upsample factor: ${factor}. Must be a positive integer.`
    );
  }
}

/**
 * Upsample a 2D image by an integer factor using nearest-neighbor
 * interpolation.
 *
 * @param source - Source image
 * @param factor - Integer scale
 * @returns New Float64 image of size (width * factor) x (height * factor)
 */
export function upsampleNearestNeighbor(
  source: DisplayImage,
  factor: number
): DisplayImage {
  assertIntegerUpsampleFactor(factor);

  const { width: srcX, height: srcY } = source;
  const tgtX = srcX * factor;
  const tgtY = srcY * factor;

  const result = new Float64Array(tgtX * tgtY);

  for (let ty = 0; ty < tgtY; ty++) {
    const sy = Math.min(Math.floor(ty / factor), srcY - 1);

    for (let tx = 0; tx < tgtX; tx++) {
      const sx = Math.min(Math.floor(tx / factor), srcX - 1);
      result[ty * tgtX + tx] = source.data[sy * srcX + sx];
    }
  }

  return { data: result, width: tgtX, height: tgtY };
}

/**
 * Upsample a 2D image by an integer factor using bilinear interpolation.
 *
 * Smoother than nearest-neighbor. Corner samples of the target align with
 * corner samples of the source.
 *
 * @param source - Source image
 * @param factor - Integer scale
 * @returns New Float64 image of size (width * factor) x (height * factor)
 */
export function upsampleBilinear(
  source: DisplayImage,
  factor: number
): DisplayImage {
  assertIntegerUpsampleFactor(factor);

  const { width: srcX, height: srcY } = source;
  const tgtX = srcX * factor;
  const tgtY = srcY * factor;
  const result = new Float64Array(tgtX * tgtY);

  // Calculate scale factors (mapping from target to source coordinates)
  const scaleY = (srcY - 1) / (tgtY - 1 || 1);
  const scaleX = (srcX - 1) / (tgtX - 1 || 1);

  for (let ty = 0; ty < tgtY; ty++) {
    const srcYf = ty * scaleY;
    const sy0 = Math.floor(srcYf);
    const sy1 = Math.min(sy0 + 1, srcY - 1);
    const yFrac = srcYf - sy0;

    for (let tx = 0; tx < tgtX; tx++) {
      const srcXf = tx * scaleX;
      const sx0 = Math.floor(srcXf);
      const sx1 = Math.min(sx0 + 1, srcX - 1);
      const xFrac = srcXf - sx0;

      const c00 = source.data[sy0 * srcX + sx0];
      const c01 = source.data[sy0 * srcX + sx1];
      const c10 = source.data[sy1 * srcX + sx0];
      const c11 = source.data[sy1 * srcX + sx1];

      const c0 = c00 * (1 - xFrac) + c01 * xFrac;
      const c1 = c10 * (1 - xFrac) + c11 * xFrac;

      result[ty * tgtX + tx] = c0 * (1 - yFrac) + c1 * yFrac;
    }
  }

  return { data: result, width: tgtX, height: tgtY };
}

/**
 * Upsample a display image with the given interpolation.
 *
 * Always returns a new image, also for a factor of 1, so callers can hand
 * the result out without exposing the source buffer.
 */
export function upsampleImage(
  source: DisplayImage,
  factor: number,
  interpolation: UpsampleInterpolation = "nearest"
): DisplayImage {
  if (source.data.length !== source.width * source.height) {
    throw new Error(
      `Image data length ${source.data.length} does not match ` +
        `${source.width}x${source.height}`
    );
  }
  return interpolation === "bilinear"
    ? upsampleBilinear(source, factor)
    : upsampleNearestNeighbor(source, factor);
}
