// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { mat3, vec2 } from "gl-matrix"

import type { BoundaryPoints, DisplayPoint, Roi } from "../types.js"

/** Swaps [row, column] into [x, y]. */
const ROW_COLUMN_TO_XY = mat3.fromValues(0, 1, 0, 1, 0, 0, 0, 0, 1)

function assertUpsampleFactor(upsampleFactor: number): void {
  if (!Number.isFinite(upsampleFactor) || upsampleFactor <= 0) {
    throw new Error(
      `Invalid upsample factor: ${upsampleFactor}. Must be a positive number.`,
    )
  }
}

/**
 * Build the affine that takes a `[row, column]` source pixel to display
 * space:
 *
 *   display = (swap(source) - upperLeftCorner + (1, 1)) * upsampleFactor
 *
 * @param upperLeftCorner - Bounding box corner [x, y] in source pixels
 * @param upsampleFactor - Display scale
 * @returns 3x3 homogeneous matrix (gl-matrix column-major)
 */
export function createBoundaryTransform(
  upperLeftCorner: [number, number],
  upsampleFactor: number,
): mat3 {
  assertUpsampleFactor(upsampleFactor)

  const transform = mat3.create()
  mat3.scale(transform, transform, [upsampleFactor, upsampleFactor])
  mat3.translate(transform, transform, [
    1 - upperLeftCorner[0],
    1 - upperLeftCorner[1],
  ])
  mat3.multiply(transform, transform, ROW_COLUMN_TO_XY)
  return transform
}

/**
 * Map a roi boundary from source pixels to upsampled display space.
 *
 * Must be recomputed whenever the roi or the upsample factor changes;
 * the result is never cached.
 *
 * @param roi - Roi whose `boundary` is in [row, column] order
 * @param upsampleFactor - Display scale
 * @returns Boundary vertices as [x, y] display points
 */
export function mapBoundary(roi: Roi, upsampleFactor: number): BoundaryPoints {
  const transform = createBoundaryTransform(roi.upperLeftCorner, upsampleFactor)
  return roi.boundary.map((point) => {
    const out: DisplayPoint = [0, 0]
    vec2.transformMat3(out, point, transform)
    return out
  })
}

/**
 * Inverse of {@link mapBoundary}: display points back to [row, column]
 * source pixels.
 */
export function unmapBoundary(
  points: BoundaryPoints,
  upperLeftCorner: [number, number],
  upsampleFactor: number,
): Array<[number, number]> {
  const transform = createBoundaryTransform(upperLeftCorner, upsampleFactor)
  const inverse = mat3.create()
  mat3.invert(inverse, transform)

  return points.map((point) => {
    const out: [number, number] = [0, 0]
    vec2.transformMat3(out, point, inverse)
    return out
  })
}

/**
 * Outline that draws nothing, used when no roi is shown.
 */
export function hiddenBoundary(): BoundaryPoints {
  return [[NaN, NaN]]
}
