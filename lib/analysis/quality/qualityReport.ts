import type { FaceBox, GrayImage, QualityReport } from "../types";
import { backgroundBokeh } from "./bokeh";
import { computeExposure, rmsContrast } from "./exposure";
import { highFrequencyRatio } from "./frequency";
import { noiseEstimate } from "./noise";
import { laplacianVariance, localSharpnessMap, tenengrad } from "./sharpness";

export interface QualityInput {
  /** Cropped face region; every metric except bokeh reads only this */
  readonly face: GrayImage;
  /** Full frame the crop came from, plus the face box in frame coordinates */
  readonly frame: GrayImage;
  readonly box: FaceBox;
  readonly includeSharpnessMap?: boolean;
}

/**
 * All image-quality metrics for one face. Pure and total.
 */
export function computeQualityReport(input: QualityInput): QualityReport {
  const { face } = input;
  return {
    sharpness_laplacian: laplacianVariance(face),
    sharpness_tenengrad: tenengrad(face),
    sharpness_fft: highFrequencyRatio(face),
    contrast_rms: rmsContrast(face),
    exposure: computeExposure(face),
    noise: noiseEstimate(face),
    bokeh: backgroundBokeh(input.frame, input.box),
    sharpness_map: input.includeSharpnessMap ? localSharpnessMap(face, 9) : null
  };
}
