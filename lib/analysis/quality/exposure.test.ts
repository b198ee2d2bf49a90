import { describe, it, expect } from "vitest";
import { computeExposure, rmsContrast } from "./exposure";

function mkGray(width: number, height: number, values: ReadonlyArray<number>) {
  return { width, height, gray: Uint8Array.from(values) };
}

describe("computeExposure", () => {
  it("counts clipped pixels strictly above 240 and below 15", () => {
    const r = computeExposure(mkGray(2, 2, [0, 10, 250, 252]));
    expect(r).toEqual({
      score: 100,
      mean_brightness: 128,
      overexposed_pct: 50,
      underexposed_pct: 50,
      exposure_diff: 0
    });
  });

  it("does not count the threshold values themselves", () => {
    const r = computeExposure(mkGray(2, 1, [15, 240]));
    expect(r.overexposed_pct).toBe(0);
    expect(r.underexposed_pct).toBe(0);
  });

  it("scores distance from middle gray", () => {
    const r = computeExposure(mkGray(2, 2, [64, 64, 64, 64]));
    expect(r.score).toBe(50);
    expect(r.exposure_diff).toBe(-64);
  });

  it("reports zeros for an empty region", () => {
    expect(computeExposure(mkGray(0, 0, [])).score).toBe(0);
  });
});

describe("rmsContrast", () => {
  it("is the standard deviation as a percentage of the mean", () => {
    expect(rmsContrast(mkGray(2, 1, [50, 150]))).toBe(50);
  });

  it("is 0 for a black image and for an empty region", () => {
    expect(rmsContrast(mkGray(2, 2, [0, 0, 0, 0]))).toBe(0);
    expect(rmsContrast(mkGray(0, 0, []))).toBe(0);
  });
});
