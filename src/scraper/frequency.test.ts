import { describe, expect, it } from "vitest";
import { rankKeys, termFrequency } from "./frequency";

describe("termFrequency", () => {
  it("counts keys in first-seen order", () => {
    expect(Array.from(termFrequency(["b", "a", "b", "c"]))).toEqual([
      ["b", 2],
      ["a", 1],
      ["c", 1],
    ]);
  });

  it("handles keys that collide with object prototype names", () => {
    expect(Array.from(termFrequency(["constructor", "__proto__", "constructor"]))).toEqual([
      ["constructor", 2],
      ["__proto__", 1],
    ]);
  });
});

describe("rankKeys", () => {
  const tokens = ["cat", "sat", "cat", "ran"];

  it("sorts by count and breaks ties by first appearance", () => {
    expect(rankKeys(tokens)).toEqual([
      { key: "cat", count: 2 },
      { key: "sat", count: 1 },
      { key: "ran", count: 1 },
    ]);
    expect(rankKeys(["b", "a", "a", "b", "c"]).map((e) => e.key)).toEqual(["b", "a", "c"]);
  });

  it("truncates to the limit", () => {
    expect(rankKeys(tokens, 2)).toEqual([
      { key: "cat", count: 2 },
      { key: "sat", count: 1 },
    ]);
  });

  it("returns everything when the limit exceeds the distinct keys", () => {
    expect(rankKeys(tokens, 10)).toHaveLength(3);
  });

  it("returns an empty list for a zero limit or no keys", () => {
    expect(rankKeys(tokens, 0)).toEqual([]);
    expect(rankKeys([], 5)).toEqual([]);
  });

  it("keeps the total equal to the number of keys", () => {
    const keys = "x y z x y x w".split(" ");
    expect(rankKeys(keys).reduce((sum, e) => sum + e.count, 0)).toBe(keys.length);
  });

  it("rejects negative or fractional limits", () => {
    expect(() => rankKeys(tokens, -1)).toThrow(RangeError);
    expect(() => rankKeys(tokens, 1.5)).toThrow("limit must be a non-negative integer, got 1.5");
  });
});
