// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, expect, it, vi } from "vitest";

import type { RoiGroupEventMap } from "../src/events.js";
import { RoiGroup } from "../src/RoiGroup.js";
import { image, makeRoi } from "./fixtures.js";

function recordChanges(group: RoiGroup): Array<RoiGroupEventMap["roiGroupChanged"]> {
  const events: Array<RoiGroupEventMap["roiGroupChanged"]> = [];
  group.addEventListener("roiGroupChanged", (event) => {
    events.push(event.detail);
  });
  return events;
}

function recordSelections(group: RoiGroup): number[][] {
  const selections: number[][] = [];
  group.addEventListener("roiSelectionChanged", (event) => {
    selections.push(event.detail.newIndices);
  });
  return selections;
}

describe("RoiGroup", () => {
  it("reads rois by index", () => {
    const group = new RoiGroup([makeRoi("a"), makeRoi("b")]);

    expect(group.count).toBe(2);
    expect(group.getRoi(1)?.id).toBe("b");
    expect(group.getRoi(2)).toBeUndefined();
    expect(group.getRoi(0.5)).toBeUndefined();
  });

  it("emits add with the new indices", () => {
    const group = new RoiGroup([makeRoi("a")]);
    const changes = recordChanges(group);

    const indices = group.addRois([makeRoi("b"), makeRoi("c")]);

    expect(indices).toEqual([1, 2]);
    expect(changes).toEqual([{ eventType: "add", roiIndices: [1, 2] }]);
  });

  it("emits modify when a roi image is replaced", () => {
    const group = new RoiGroup([makeRoi("a")]);
    const changes = recordChanges(group);
    const thumb = image([1], 1, 1);

    group.setRoiImage(0, thumb);

    expect(group.getRoi(0)?.storedImage).toBe(thumb);
    expect(changes).toEqual([{ eventType: "modify", roiIndices: [0] }]);
  });

  it("moves boundary and corner together on translate", () => {
    const group = new RoiGroup([makeRoi("a")]);

    group.translateRoi(0, 3, -1);

    const roi = group.getRoi(0);
    expect(roi?.upperLeftCorner).toEqual([13, 19]);
    expect(roi?.boundary[0]).toEqual([19, 13]);
  });

  it("drops the stored image on reshape", () => {
    const group = new RoiGroup([makeRoi("a", image([1], 1, 1))]);
    const changes = recordChanges(group);

    group.reshapeRoi(0, [[1, 1]], [1, 1]);

    expect(group.getRoi(0)?.storedImage).toBeNull();
    expect(changes).toEqual([{ eventType: "reshape", roiIndices: [0] }]);
  });

  it("shifts the selection when rois before it are removed", () => {
    const group = new RoiGroup([makeRoi("a"), makeRoi("b"), makeRoi("c")]);
    group.select([1, 2]);
    const changes = recordChanges(group);
    const selections = recordSelections(group);

    group.removeRois([0]);

    expect(group.count).toBe(2);
    expect(group.getRoi(0)?.id).toBe("b");
    expect(changes).toEqual([{ eventType: "remove", roiIndices: [0] }]);
    expect(selections).toEqual([[0, 1]]);
    expect(group.selectedIndices).toEqual([0, 1]);
  });

  it("drops removed rois from the selection", () => {
    const group = new RoiGroup([makeRoi("a"), makeRoi("b")]);
    group.select([1]);
    const selections = recordSelections(group);

    group.removeRois([1]);

    expect(selections).toEqual([[]]);
  });

  it("leaves an unaffected selection alone", () => {
    const group = new RoiGroup([makeRoi("a"), makeRoi("b")]);
    group.select([0]);
    const selections = recordSelections(group);

    group.removeRois([1]);

    expect(selections).toEqual([]);
  });

  it("emits classification changes", () => {
    const group = new RoiGroup([makeRoi("a")]);
    const listener = vi.fn();
    group.addEventListener("roiClassificationChanged", listener);

    group.classifyRois([0], 3);

    expect(group.getRoi(0)?.classification).toBe(3);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("rejects out-of-range indices", () => {
    const group = new RoiGroup([makeRoi("a")]);

    expect(() => group.select([4])).toThrow(
      "Roi index 4 is out of range for a group of 1 rois",
    );
    expect(() => group.removeRois([1])).toThrow(/out of range/);
    expect(group.count).toBe(1);
  });
});
