/*
  facetier — Sharpness estimators

  Metrics
  - Variance of Laplacian (3x3 aperture).
  - Tenengrad: sum of squared Sobel gradient magnitudes.
  - Local |Laplacian| map with a 9x9 aperture (diagnostic only).

  Notes
  - Operates on raw grayscale pixels (Uint8Array) in row-major order.
  - Degenerate (0-area) input yields 0, never an exception.
*/

import type { GrayImage, SharpnessMap } from "../types";
import { binomialKernel, convolve1d, filterCols, filterRows, populationStats } from "./filters";

const SECOND_DIFF = [1, -2, 1] as const;
const SOBEL_DIFF = [-1, 0, 1] as const;
const SOBEL_SMOOTH = [1, 2, 1] as const;

function isEmpty(img: GrayImage): boolean {
  return img.width <= 0 || img.height <= 0;
}

/**
 * Per-pixel Laplacian response using:
 *   [ 0  1  0
 *     1 -4  1
 *     0  1  0 ]
 */
export function laplacianResponse(img: GrayImage): Float64Array {
  const { width, height, gray } = img;
  const dxx = filterRows(gray, width, height, SECOND_DIFF);
  const dyy = filterCols(gray, width, height, SECOND_DIFF);
  for (let i = 0; i < dxx.length; i++) dxx[i] += dyy[i];
  return dxx;
}

export function laplacianVariance(img: GrayImage): number {
  if (isEmpty(img)) return 0;
  return populationStats(laplacianResponse(img)).variance;
}

export function tenengrad(img: GrayImage): number {
  if (isEmpty(img)) return 0;
  const { width, height, gray } = img;

  const gx = filterCols(filterRows(gray, width, height, SOBEL_DIFF), width, height, SOBEL_SMOOTH);
  const gy = filterCols(filterRows(gray, width, height, SOBEL_SMOOTH), width, height, SOBEL_DIFF);

  let sum = 0;
  for (let i = 0; i < gx.length; i++) sum += gx[i] * gx[i] + gy[i] * gy[i];
  return sum;
}

/**
 * |Laplacian| with an odd aperture >= 3, built from the binomial smoothing family:
 *   d2 = (1+z)^(k-3) * (1-z)^2, smooth = (1+z)^(k-1)
 *   L  = d2(x)·smooth(y) + smooth(x)·d2(y)
 */
export function localSharpnessMap(img: GrayImage, aperture: number = 9): SharpnessMap {
  if (aperture < 3 || aperture % 2 === 0) {
    throw new Error(`aperture must be odd and >= 3 (got ${aperture})`);
  }
  const { width, height, gray } = img;
  if (isEmpty(img)) return { width: 0, height: 0, values: new Float64Array(0) };

  const d2 = convolve1d(binomialKernel(aperture - 3), SECOND_DIFF);
  const smooth = binomialKernel(aperture - 1);

  const a = filterCols(filterRows(gray, width, height, d2), width, height, smooth);
  const b = filterCols(filterRows(gray, width, height, smooth), width, height, d2);

  const values = new Float64Array(width * height);
  for (let i = 0; i < values.length; i++) values[i] = Math.abs(a[i] + b[i]);

  return { width, height, values };
}
