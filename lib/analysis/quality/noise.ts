import type { GrayImage } from "../types";
import { filterCols, filterRows, populationStats } from "./filters";

// 5x5 Gaussian, separable binomial taps; the 2-D kernel sums to 256
const GAUSS_5 = [1, 4, 6, 4, 1] as const;

/**
 * Standard deviation of (image - blurred(image)). The blurred image is
 * rounded back to 8-bit before the difference is taken.
 */
export function noiseEstimate(img: GrayImage): number {
  const { width, height, gray } = img;
  if (width <= 0 || height <= 0) return 0;

  const blurred = filterCols(filterRows(gray, width, height, GAUSS_5), width, height, GAUSS_5);

  const diff = new Float64Array(width * height);
  for (let i = 0; i < diff.length; i++) {
    diff[i] = gray[i] - Math.round(blurred[i] / 256);
  }

  return Math.sqrt(populationStats(diff).variance);
}
