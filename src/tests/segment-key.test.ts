/**
 * Segment keys and keyed count maps
 */
import { describe, it, expect } from "vitest";
import {
  SegmentKeyMap,
  createSegmentKey,
  formatSegmentKey,
  incrementCount,
  mergeCounts,
  segmentKeysEqual,
} from "../utils/segment-key.js";

const key = (corridorId: string, startMilepost: string, endMilepost: string, departmentId: string) =>
  createSegmentKey({ corridorId, startMilepost, endMilepost, departmentId });

describe("createSegmentKey", () => {
  it("normalizes ids and trims mileposts", () => {
    expect(key(" mt-1", " 0+0.0 ", "10+0.0", "n-1 ")).toEqual({
      corridorId: "MT-1",
      startMilepost: "0+0.0",
      endMilepost: "10+0.0",
      departmentId: "N-1",
    });
  });

  it("maps missing fields to empty strings", () => {
    expect(
      createSegmentKey({ corridorId: null, startMilepost: undefined, endMilepost: null, departmentId: undefined })
    ).toEqual({ corridorId: "", startMilepost: "", endMilepost: "", departmentId: "" });
  });
});

describe("formatSegmentKey", () => {
  it("joins the fields with underscores", () => {
    expect(formatSegmentKey(key("MT-1", "0+0.0", "10+0.0", "N-1"))).toBe("MT-1_0+0.0_10+0.0_N-1");
  });
});

describe("SegmentKeyMap", () => {
  it("compares keys by value", () => {
    const map = new SegmentKeyMap<string>();
    map.set(key("MT-1", "0", "1", "N-1"), "first");
    expect(map.get(key("MT-1", "0", "1", "N-1"))).toBe("first");
    expect(map.has(key("MT-1", "0", "1", "N-2"))).toBe(false);
  });

  it("keeps keys distinct when their labels collide", () => {
    const a = key("A_B", "1", "2", "C");
    const b = key("A", "B_1", "2", "C");
    expect(formatSegmentKey(a)).toBe(formatSegmentKey(b));
    expect(segmentKeysEqual(a, b)).toBe(false);

    const map = new SegmentKeyMap<number>();
    map.set(a, 1);
    map.set(b, 2);
    expect(map.size).toBe(2);
    expect(map.get(a)).toBe(1);
    expect(map.get(b)).toBe(2);
  });

  it("keeps the first key object on overwrite", () => {
    const first = key("MT-1", "0", "1", "N-1");
    const map = new SegmentKeyMap<number>();
    map.set(first, 1);
    map.set(key("MT-1", "0", "1", "N-1"), 2);
    const [[storedKey, value]] = [...map];
    expect(storedKey).toBe(first);
    expect(value).toBe(2);
  });

  it("iterates in insertion order", () => {
    const map = new SegmentKeyMap<number>();
    map.set(key("B", "0", "1", "X"), 1);
    map.set(key("A", "0", "1", "X"), 2);
    expect([...map.keys()].map((k) => k.corridorId)).toEqual(["B", "A"]);
  });
});

describe("count helpers", () => {
  it("increments counts", () => {
    const counts = new SegmentKeyMap<number>();
    const k = key("MT-1", "0", "1", "N-1");
    incrementCount(counts, k);
    incrementCount(counts, k, 3);
    expect(counts.get(k)).toBe(4);
  });

  it("merges partial counts regardless of split", () => {
    const k1 = key("MT-1", "0", "1", "N-1");
    const k2 = key("MT-1", "1", "2", "N-1");

    const left = new SegmentKeyMap<number>();
    incrementCount(left, k1, 2);
    const right = new SegmentKeyMap<number>();
    incrementCount(right, k1);
    incrementCount(right, k2, 5);

    const merged = mergeCounts(left, right);
    expect(merged.get(k1)).toBe(3);
    expect(merged.get(k2)).toBe(5);
    expect(mergeCounts(right, left).get(k1)).toBe(3);
    expect(mergeCounts().size).toBe(0);
  });
});
