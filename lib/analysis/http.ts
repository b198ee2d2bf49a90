/*
  facetier — Route handler helpers

  Shared by /api/analyze and /api/analyze/batch:
  - config from environment
  - multipart field parsing (image bytes + landmarks JSON)
  - one analyzer per image, released after use
*/

import { SUPPORTED_LOCALES, buildAnalysisConfig, type AnalysisConfig, type Locale } from "./config";
import { LandmarkPayloadError, SuppliedLandmarksDetector, parseLandmarkPayload } from "./detection/suppliedLandmarks";
import { FaceAnalyzer } from "./faceAnalyzer";
import type { StructuredLogger } from "./logging/analysisLogger";
import type { AnalysisResult } from "./types";

export type Env = Readonly<Record<string, string | undefined>>;

function envLocale(raw: string | undefined): Locale {
  const v = (raw ?? "en").trim().toLowerCase();
  const found = SUPPORTED_LOCALES.find((l) => l === v);
  if (!found) throw new Error(`FACETIER_LOCALE must be one of ${SUPPORTED_LOCALES.join(", ")} (got ${v})`);
  return found;
}

export function analysisConfigFromEnv(env: Env = process.env): AnalysisConfig {
  const debug = (env.FACETIER_DEBUG ?? "").trim();
  return buildAnalysisConfig({
    model_version: env.FACETIER_MODEL_VERSION ?? "1.0.0",
    max_width_used: Number(env.FACETIER_MAX_WIDTH ?? 2048),
    locale: envLocale(env.FACETIER_LOCALE),
    debug: { log_stages: debug === "1" || debug.toLowerCase() === "true" }
  });
}

/** Client-side mistakes (missing file, malformed landmarks) map to HTTP 400. */
export class BadRequestError extends Error {
  readonly name = "BadRequestError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

export function isBadRequest(e: unknown): e is BadRequestError | LandmarkPayloadError {
  return e instanceof BadRequestError || e instanceof LandmarkPayloadError;
}

/**
 * Parse a landmarks form field. Absent field means "no face supplied".
 */
export function parseLandmarksField(value: FormDataEntryValue | null | undefined): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value !== "string") throw new BadRequestError("landmarks must be a JSON string field");
  if (!value.trim()) return null;
  try {
    return JSON.parse(value);
  } catch (e) {
    throw new BadRequestError("landmarks is not valid JSON", e);
  }
}

export async function fileBytes(value: FormDataEntryValue | null, field: string): Promise<Uint8Array> {
  if (!value || typeof value === "string") throw new BadRequestError(`multipart field "${field}" must be a file`);
  return new Uint8Array(await value.arrayBuffer());
}

export interface AnalyzeUploadParams {
  readonly bytes: Uint8Array;
  readonly landmarks: unknown;
  readonly config: AnalysisConfig;
  readonly log?: StructuredLogger;
  readonly requestId?: string;
}

/**
 * Validate landmarks, run one analysis, release the detector handle.
 */
export async function analyzeUpload(params: AnalyzeUploadParams): Promise<AnalysisResult> {
  const payload = parseLandmarkPayload(params.landmarks);
  const analyzer = new FaceAnalyzer({
    detector: new SuppliedLandmarksDetector(payload),
    config: params.config,
    log: params.log
  });

  await analyzer.initialize();
  try {
    return await analyzer.analyzeBytes(params.bytes, { request_id: params.requestId });
  } finally {
    await analyzer.release();
  }
}

export function withoutQuality(result: AnalysisResult): AnalysisResult {
  const { quality: _quality, ...rest } = result;
  return rest;
}
