/*
  facetier — Exposure + contrast

  Signals
  - Mean luminance (0..255) and its distance from middle gray (128).
  - Over/under-exposed share: luminance > 240 / < 15, in percent.
  - RMS contrast relative to the mean, in percent.
*/

import type { ExposureReport, GrayImage } from "../types";
import { populationStats } from "./filters";

export const MIDDLE_GRAY = 128;
export const OVEREXPOSED_ABOVE = 240;
export const UNDEREXPOSED_BELOW = 15;

function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

export function computeExposure(img: GrayImage): ExposureReport {
  const n = img.width * img.height;
  if (n <= 0) {
    return { score: 0, mean_brightness: 0, overexposed_pct: 0, underexposed_pct: 0, exposure_diff: 0 };
  }

  let sum = 0;
  let over = 0;
  let under = 0;
  for (let i = 0; i < n; i++) {
    const v = img.gray[i];
    sum += v;
    if (v > OVEREXPOSED_ABOVE) over += 1;
    if (v < UNDEREXPOSED_BELOW) under += 1;
  }

  const mean = sum / n;

  return {
    score: clamp(100 - (Math.abs(mean - MIDDLE_GRAY) / MIDDLE_GRAY) * 100, 0, 100),
    mean_brightness: mean,
    overexposed_pct: (over / n) * 100,
    underexposed_pct: (under / n) * 100,
    exposure_diff: mean - MIDDLE_GRAY
  };
}

/**
 * RMS deviation from the mean as a percentage of the mean; 0 when the mean is 0.
 */
export function rmsContrast(img: GrayImage): number {
  const n = img.width * img.height;
  if (n <= 0) return 0;

  const { mean, variance } = populationStats(img.gray.subarray(0, n));
  if (mean === 0) return 0;
  return (Math.sqrt(variance) / mean) * 100;
}
