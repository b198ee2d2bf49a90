/*
  facetier — Strict types for face analysis.
  Keep this file dependency-free so it can be imported across route handlers,
  domain modules, and tests without side effects.
*/

import type { AxisName, ReasonCodeString, StyleLabel } from "./config";

export interface Point3D {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Pixel-space face box, top-left origin */
export interface FaceBox {
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

/**
 * What the detection collaborator hands back for the primary face.
 * `null` from a detector means no face, which is not an error.
 */
export interface FaceDetection {
  readonly box: FaceBox;
  /** Dense fixed-topology mesh; absent when the detector produced none */
  readonly mesh: ReadonlyArray<Point3D> | null;
  /** 0..1 */
  readonly confidence: number;
}

/** 8-bit grayscale pixels, row-major, length = width * height */
export interface GrayImage {
  readonly width: number;
  readonly height: number;
  readonly gray: Uint8Array;
}

/** A decoded frame as seen by detectors and the analyzer */
export interface Frame extends GrayImage {
  /** decoded width / source width */
  readonly scale: number;
}

export interface ExposureReport {
  /** 0..100 */
  readonly score: number;
  /** 0..255 */
  readonly mean_brightness: number;
  /** % of pixels with luminance > 240 */
  readonly overexposed_pct: number;
  /** % of pixels with luminance < 15 */
  readonly underexposed_pct: number;
  /** mean_brightness - 128 */
  readonly exposure_diff: number;
}

export interface SharpnessMap {
  readonly width: number;
  readonly height: number;
  readonly values: Float64Array;
}

export interface QualityReport {
  readonly sharpness_laplacian: number;
  readonly sharpness_tenengrad: number;
  /** 0..1 */
  readonly sharpness_fft: number;
  /** RMS contrast as % of mean luminance */
  readonly contrast_rms: number;
  readonly exposure: ExposureReport;
  readonly noise: number;
  /** 0..100, 50 when undefined */
  readonly bokeh: number;
  /** Diagnostic only, never consumed by scoring */
  readonly sharpness_map: SharpnessMap | null;
}

/** Degrees, unclamped */
export interface Pose {
  readonly yaw: number;
  readonly pitch: number;
  readonly roll: number;
}

export interface Proportions {
  readonly jaw_angle: number;
  readonly eye_distance: number;
  readonly face_width: number;
  readonly face_height: number;
  /** 0..100 */
  readonly symmetry_score: number;
  readonly cheekbone_prominence: number;
}

export interface Occlusions {
  readonly glasses: boolean;
  readonly mask: boolean;
  readonly hand: boolean;
}

export type AxisScores = Readonly<Record<AxisName, number>>;

export interface ClassificationResult {
  readonly label: StyleLabel;
  /** 0..1 */
  readonly confidence: number;
  /** 0..100 */
  readonly composite: number;
  readonly tags: ReadonlyArray<string>;
  /** Positive reasons first, then negative */
  readonly reasons: ReadonlyArray<string>;
}

export interface AnalysisResult {
  readonly ok: boolean;
  /** null when the pipeline stopped before axes were computed */
  readonly axes: AxisScores | null;
  readonly label: StyleLabel;
  readonly confidence: number;
  readonly reasons: ReadonlyArray<string>;
  readonly abstain: boolean;
  readonly model_version: string;
  readonly pose?: Pose;
  readonly proportions?: Proportions;
  readonly quality?: QualityReport;
}

export interface AnalysisTimingsMs {
  readonly decode_ms: number;
  readonly detect_ms: number;
  readonly crop_ms: number;
  readonly metrics_ms: number;
  readonly geometry_ms: number;
  readonly classify_ms: number;
  readonly total_ms: number;
}

export type ReasonCodeCounts = Readonly<Partial<Record<ReasonCodeString, number>>>;

/**
 * Summary emitted once per analysis (structured log).
 */
export interface AnalysisSummary {
  readonly request_id: string;
  readonly config_version: string;
  readonly model_version: string;
  readonly ok: boolean;
  readonly abstain: boolean;
  readonly label: StyleLabel;
  readonly confidence: number;
  readonly composite: number | null;
  readonly timings_ms: AnalysisTimingsMs;
  readonly reason_code_counts: ReasonCodeCounts;
}
