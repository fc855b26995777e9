import { describe, expect, it } from "vitest";
import { IncompatibleDimensionError } from "../errors.js";
import { cosineSimilarity } from "../similarity.js";

describe("cosineSimilarity", () => {
  it("scores identical direction as 1", () => {
    expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBe(1);
    expect(cosineSimilarity([1, 0], [5, 0])).toBe(1);
  });

  it("scores orthogonal vectors as 0", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("scores opposite vectors as -1", () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it("computes the angle between mixed vectors", () => {
    expect(cosineSimilarity([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2, 12);
  });

  it("returns 0 for a zero-magnitude input", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });

  it("accepts Float32Array", () => {
    expect(cosineSimilarity(new Float32Array([3, 4]), [3, 4])).toBe(1);
  });

  it("throws on a length mismatch", () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(IncompatibleDimensionError);
  });
});
