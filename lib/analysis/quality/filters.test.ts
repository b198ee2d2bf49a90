import { describe, it, expect } from "vitest";
import { binomialKernel, convolve1d, filterCols, filterRows, populationStats, reflect101 } from "./filters";

describe("reflect101", () => {
  it("mirrors around the edge pixel without repeating it", () => {
    expect([-2, -1, 0, 4, 5, 6].map((i) => reflect101(i, 5))).toEqual([2, 1, 0, 4, 3, 2]);
  });

  it("maps everything onto index 0 for a length-1 axis", () => {
    expect(reflect101(-3, 1)).toBe(0);
    expect(reflect101(3, 1)).toBe(0);
  });
});

describe("kernels", () => {
  it("binomialKernel(4) is the 5-tap Gaussian", () => {
    expect(binomialKernel(4)).toEqual([1, 4, 6, 4, 1]);
  });

  it("convolve1d builds the smoothed second difference", () => {
    expect(convolve1d([1, 2, 1], [1, -2, 1])).toEqual([1, 0, -2, 0, 1]);
  });
});

describe("filterRows / filterCols", () => {
  it("applies a second difference along a row with reflect-101 ends", () => {
    const out = filterRows([0, 0, 10, 0, 0], 5, 1, [1, -2, 1]);
    expect(Array.from(out)).toEqual([0, 10, -20, 10, 0]);
  });

  it("filters columns independently of rows", () => {
    // 2 wide, 3 tall; column 0 = [0, 6, 0], column 1 = [1, 1, 1]
    const out = filterCols([0, 1, 6, 1, 0, 1], 2, 3, [1, -2, 1]);
    expect(Array.from(out)).toEqual([12, 0, -12, 0, 12, 0]);
  });
});

describe("populationStats", () => {
  it("uses the population (not sample) variance", () => {
    const s = populationStats([2, 4, 4, 4, 5, 5, 7, 9]);
    expect(s).toEqual({ mean: 5, variance: 4, n: 8 });
  });

  it("returns zeros for empty input", () => {
    expect(populationStats([])).toEqual({ mean: 0, variance: 0, n: 0 });
  });
});
