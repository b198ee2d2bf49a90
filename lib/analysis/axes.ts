/*
  facetier — Axis aggregation

  Collapses the quality report and (optional) geometry into the five axes
  the classifier reads. Only sharpness and contrast are clamped (to <= 100).
*/

import type { AnalysisConfig } from "./config";
import type { AxisScores, Pose, Proportions, QualityReport } from "./types";
import { jawlineScore, poseScore } from "./geometry/geometry";

export interface AxisInput {
  readonly quality: QualityReport;
  readonly pose: Pose | null;
  readonly proportions: Proportions | null;
}

export function calculateAxes(input: AxisInput, config: AnalysisConfig): AxisScores {
  const a = config.axes;
  const q = input.quality;

  const sharpness = Math.min(
    100,
    (q.sharpness_laplacian / a.laplacian_divisor) * a.laplacian_weight +
      (q.sharpness_tenengrad / a.tenengrad_divisor) * a.tenengrad_weight +
      q.sharpness_fft * a.frequency_weight
  );

  const lighting =
    q.exposure.score * a.exposure_weight +
    (100 - q.exposure.overexposed_pct - q.exposure.underexposed_pct) * a.clipping_weight;

  const pose = input.pose ? poseScore(input.pose) : a.missing_mesh_default;
  const jawline = input.proportions ? jawlineScore(input.proportions) : a.missing_mesh_default;

  const contrast = Math.min(100, q.contrast_rms * a.contrast_multiplier);

  return { sharpness, lighting, pose, jawline, contrast };
}

export function meanAxis(axes: AxisScores): number {
  return (axes.sharpness + axes.lighting + axes.pose + axes.jawline + axes.contrast) / 5;
}
