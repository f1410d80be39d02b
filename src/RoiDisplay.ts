// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type { RoiGroupEventMap } from "./events.js"
import type { RoiGroup } from "./RoiGroup.js"
import type { UnsupportedResult } from "./types.js"

/**
 * Capability shared by every view that reacts to a roi collection.
 *
 * Displays that cannot change the collection answer `addRois` and
 * `removeRois` with an {@link UnsupportedResult}.
 */
export interface RoiDisplay {
  onCollectionChanged(event: RoiGroupEventMap["roiGroupChanged"]): void
  onSelectionChanged(event: RoiGroupEventMap["roiSelectionChanged"]): void
  onClassificationChanged(
    event: RoiGroupEventMap["roiClassificationChanged"],
  ): void
  addRois(...args: unknown[]): UnsupportedResult | void
  removeRois(...args: unknown[]): UnsupportedResult | void
}

/**
 * Build the result a display returns for a mutation it does not support.
 */
export function unsupported(
  operation: UnsupportedResult["operation"],
  displayName: string,
): UnsupportedResult {
  return {
    ok: false,
    kind: "unsupported",
    operation,
    message: `${operation} is not supported by ${displayName}`,
  }
}

/**
 * Subscribe a display to a roi group's notifications.
 *
 * Errors thrown by the display are logged and do not reach the group.
 *
 * @returns Function that removes all listeners added here
 *
 * @example
 * ```typescript
 * const detach = attachRoiDisplay(display, group);
 * // ...
 * detach();
 * ```
 */
export function attachRoiDisplay(
  display: RoiDisplay,
  group: RoiGroup,
): () => void {
  const controller = new AbortController()
  const options = { signal: controller.signal }

  const guard = (name: string, fn: () => void): void => {
    try {
      fn()
    } catch (error) {
      console.error(`[roi-thumbnail] Error handling ${name}:`, error)
    }
  }

  group.addEventListener(
    "roiGroupChanged",
    (event) => guard("roiGroupChanged", () => display.onCollectionChanged(event.detail)),
    options,
  )
  group.addEventListener(
    "roiSelectionChanged",
    (event) => guard("roiSelectionChanged", () => display.onSelectionChanged(event.detail)),
    options,
  )
  group.addEventListener(
    "roiClassificationChanged",
    (event) =>
      guard("roiClassificationChanged", () =>
        display.onClassificationChanged(event.detail),
      ),
    options,
  )

  return () => controller.abort()
}
