// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type { DisplayRange, TypedArray } from "./types.js"

/**
 * Compute the color range `[min, max]` of a sample array.
 *
 * NaN samples are skipped. A degenerate range (`max <= min`, e.g. a
 * constant image) is widened to `[min, min + 1]` so it can always be
 * used as color limits. Empty or all-NaN data yields `[0, 1]`.
 *
 * @example
 * ```ts
 * computeDisplayRange(new Float32Array([3, 9, 5]))  // [3, 9]
 * computeDisplayRange(new Uint8Array([7, 7]))       // [7, 8]
 * ```
 */
export function computeDisplayRange(data: TypedArray): DisplayRange {
  let min = Infinity
  let max = -Infinity
  for (let i = 0; i < data.length; i++) {
    const val = data[i]
    if (Number.isNaN(val)) continue
    if (val < min) min = val
    if (val > max) max = val
  }

  if (min === Infinity) {
    return [0, 1]
  }
  if (max <= min) {
    return [min, min + 1]
  }
  return [min, max]
}

/**
 * Map single-channel samples to uint8 through a display window.
 *
 * Values in `[start, end]` are linearly mapped to `[0, 255]` with
 * clamping at both ends. NaN samples map to 0.
 *
 * @example
 * ```ts
 * normalizeToUint8(new Float64Array([0, 5, 10]), [0, 10])
 * // Uint8Array [0, 128, 255]
 * ```
 */
export function normalizeToUint8(
  source: TypedArray,
  displayRange: DisplayRange,
): Uint8Array {
  const len = source.length
  const output = new Uint8Array(len)

  const [start, end] = displayRange
  const range = end - start
  // Degenerate window: all values map to 0
  const scale = range > 0 ? 255 / range : 0
  const offset = range > 0 ? start : 0

  for (let i = 0; i < len; i++) {
    const scaled = (source[i] - offset) * scale
    output[i] = Number.isNaN(scaled)
      ? 0
      : scaled <= 0
        ? 0
        : scaled >= 255
          ? 255
          : (scaled + 0.5) | 0
  }

  return output
}
