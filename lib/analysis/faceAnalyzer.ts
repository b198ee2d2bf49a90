/*
  facetier — Face Analysis Orchestrator

  Linear pipeline, each failing stage ends in an abstain result:
  - Decode (bytes entry point only)   -> "could not load image"
  - Detect (injected collaborator)    -> "no face detected"
  - Crop face box                     -> "could not extract face region"
  - Quality metrics
  - Geometry (only when a mesh is present)
  - Axes -> abstention check -> classify -> reason notes

  Notes
  - The analyzer owns its detector handle: initialize() once, analyze serially,
    release() on shutdown. Nothing is shared between analyzer instances.
  - Does not persist anything. Caller decides transport and storage.
*/

import { randomUUID } from "node:crypto";

import { calculateAxes, meanAxis } from "./axes";
import { RuleBasedClassifier } from "./classifier/ruleBasedClassifier";
import type { StyleClassifier } from "./classifier/styleClassifier";
import { ReasonCode, buildAnalysisConfig, type AnalysisConfig } from "./config";
import { DetectorStateError, type FaceDetector } from "./detection/faceDetector";
import { calculatePose, calculateProportions } from "./geometry/geometry";
import { isUsableMesh } from "./geometry/landmarks";
import { cropGray } from "./image/crop";
import { DecodeError, decodeImage } from "./image/decode";
import { createAnalysisLogger, type AnalysisLogger, type StructuredLogger } from "./logging/analysisLogger";
import { messagesFor, type MessageCatalog, type MessageKey } from "./messages";
import { computeQualityReport } from "./quality/qualityReport";
import type {
  AnalysisResult,
  AnalysisTimingsMs,
  AxisScores,
  FaceDetection,
  Frame,
  Pose,
  Proportions,
  QualityReport
} from "./types";

export type AnalyzerState = "created" | "ready" | "released";

export interface FaceAnalyzerDeps {
  readonly detector: FaceDetector;
  /** Defaults to the rule ladder built from `config` */
  readonly classifier?: StyleClassifier;
  readonly config?: AnalysisConfig;

  /** Structured logger hook; if omitted, nothing is logged. */
  log?: StructuredLogger;

  /** Clock in ms for testability */
  nowMs?: () => number;
}

export interface AnalyzeOptions {
  /** Optional caller-provided id for log correlation. */
  readonly request_id?: string;
}

type StageTimings = { -readonly [K in keyof AnalysisTimingsMs]: number };

function emptyTimings(): StageTimings {
  return { decode_ms: 0, detect_ms: 0, crop_ms: 0, metrics_ms: 0, geometry_ms: 0, classify_ms: 0, total_ms: 0 };
}

export class FaceAnalyzer {
  readonly config: AnalysisConfig;
  private readonly detector: FaceDetector;
  private readonly classifier: StyleClassifier;
  private readonly messages: MessageCatalog;
  private readonly log?: StructuredLogger;
  private readonly nowMs: () => number;
  private state: AnalyzerState = "created";

  constructor(deps: FaceAnalyzerDeps) {
    this.config = deps.config ?? buildAnalysisConfig();
    this.detector = deps.detector;
    this.classifier = deps.classifier ?? new RuleBasedClassifier(this.config);
    this.messages = messagesFor(this.config.locale);
    this.log = deps.log;
    this.nowMs = deps.nowMs ?? (() => Date.now());
  }

  get currentState(): AnalyzerState {
    return this.state;
  }

  async initialize(): Promise<void> {
    if (this.state === "ready") return;
    if (this.state === "released") {
      throw new DetectorStateError(`analyzer already released (detector=${this.detector.name})`);
    }
    await this.detector.initialize();
    this.state = "ready";
  }

  async release(): Promise<void> {
    if (this.state !== "ready") {
      this.state = "released";
      return;
    }
    this.state = "released";
    await this.detector.release();
  }

  /**
   * Decode encoded image bytes, then analyze. Undecodable input is an abstain
   * result, not an exception.
   */
  async analyzeBytes(bytes: Uint8Array, opts: AnalyzeOptions = {}): Promise<AnalysisResult> {
    this.assertReady();
    const started = this.nowMs();
    const logger = this.createLogger(opts);

    let frame: Frame;
    try {
      frame = await decodeImage(bytes, { maxWidthUsed: this.config.max_width_used });
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e;
      logger.debugStage("decode", { error: e.message });
      const timings = emptyTimings();
      timings.decode_ms = timings.total_ms = this.nowMs() - started;
      return this.fail(logger, ReasonCode.E_DECODE_FAILED, "decode_failed", timings);
    }

    const timings = emptyTimings();
    timings.decode_ms = this.nowMs() - started;
    return this.run(frame, logger, timings, started);
  }

  /**
   * Analyze an already decoded frame. Synchronous and deterministic for a
   * deterministic detector.
   */
  analyzeImage(frame: Frame, opts: AnalyzeOptions = {}): AnalysisResult {
    this.assertReady();
    return this.run(frame, this.createLogger(opts), emptyTimings(), this.nowMs());
  }

  private assertReady(): void {
    if (this.state !== "ready") {
      throw new DetectorStateError(`analyzer is ${this.state}; call initialize() before analyzing`);
    }
  }

  private createLogger(opts: AnalyzeOptions): AnalysisLogger {
    return createAnalysisLogger({
      request_id: opts.request_id ?? randomUUID(),
      config_version: this.config.version,
      model_version: this.config.model_version,
      log: this.log,
      debug: this.config.debug.log_stages
    });
  }

  private run(frame: Frame, logger: AnalysisLogger, timings: StageTimings, started: number): AnalysisResult {
    const lap = (key: Exclude<keyof StageTimings, "total_ms">, from: number): number => {
      const now = this.nowMs();
      timings[key] = now - from;
      return now;
    };

    let t = this.nowMs();
    const detection: FaceDetection | null = this.detector.detect(frame);
    t = lap("detect_ms", t);
    if (!detection) {
      timings.total_ms = this.nowMs() - started;
      return this.fail(logger, ReasonCode.E_NO_FACE, "no_face", timings);
    }
    logger.debugStage("detect", { box: detection.box, confidence: detection.confidence, mesh: detection.mesh?.length ?? 0 });

    // a box with NaN/Infinity coordinates is treated like one outside the frame
    const { x, y, w, h } = detection.box;
    const face = [x, y, w, h].every(Number.isFinite) ? cropGray(frame, detection.box) : null;
    t = lap("crop_ms", t);
    if (!face || face.width * face.height === 0) {
      timings.total_ms = this.nowMs() - started;
      return this.fail(logger, ReasonCode.E_EMPTY_CROP, "empty_crop", timings);
    }

    const quality = computeQualityReport({
      face,
      frame,
      box: detection.box,
      includeSharpnessMap: this.config.include_sharpness_map
    });
    t = lap("metrics_ms", t);

    let pose: Pose | null = null;
    let proportions: Proportions | null = null;
    if (isUsableMesh(detection.mesh)) {
      pose = calculatePose(detection.mesh);
      proportions = calculateProportions(detection.mesh);
    } else {
      logger.addReason(ReasonCode.E_NO_MESH);
    }
    t = lap("geometry_ms", t);

    const axes = calculateAxes({ quality, pose, proportions }, this.config);
    logger.debugStage("axes", axes);

    const abstain = this.shouldAbstain(axes, detection.confidence, pose, logger);
    const classification = this.classifier.classify(axes);
    const reasons = [...classification.reasons, ...this.reasonNotes(quality, pose, proportions)];
    lap("classify_ms", t);
    timings.total_ms = this.nowMs() - started;

    if (!abstain) logger.addReason(ReasonCode.E_OK);
    logger.finalizeAndLog({
      ok: true,
      abstain,
      label: classification.label,
      confidence: classification.confidence,
      composite: classification.composite,
      timings_ms: timings
    });

    return {
      ok: true,
      axes,
      label: classification.label,
      confidence: classification.confidence,
      reasons,
      abstain,
      model_version: this.config.model_version,
      ...(pose ? { pose } : {}),
      ...(proportions ? { proportions } : {}),
      quality
    };
  }

  private shouldAbstain(axes: AxisScores, detectorConfidence: number, pose: Pose | null, logger: AnalysisLogger): boolean {
    const ab = this.config.abstain;
    let abstain = false;

    if (detectorConfidence < ab.min_detector_confidence) {
      logger.addReason(ReasonCode.E_LOW_DETECTOR_CONFIDENCE);
      abstain = true;
    }
    if (pose && (Math.abs(pose.yaw) > ab.max_abs_yaw || Math.abs(pose.pitch) > ab.max_abs_pitch)) {
      logger.addReason(ReasonCode.E_EXTREME_POSE);
      abstain = true;
    }
    if (meanAxis(axes) < ab.min_mean_axis) {
      logger.addReason(ReasonCode.E_LOW_AXES);
      abstain = true;
    }

    if (abstain) logger.addReason(ReasonCode.E_ABSTAIN);
    return abstain;
  }

  private reasonNotes(quality: QualityReport, pose: Pose | null, proportions: Proportions | null): string[] {
    const n = this.config.notes;
    const notes: string[] = [];

    if (pose) {
      if (Math.abs(pose.yaw) > n.tilt_degrees) notes.push(this.messages.yaw(pose.yaw));
      if (Math.abs(pose.pitch) > n.tilt_degrees) notes.push(this.messages.pitch(pose.pitch));
    }

    const diff = quality.exposure.exposure_diff;
    if (Math.abs(diff) > n.exposure_deviation) notes.push(this.messages.exposure(diff));

    if (proportions && proportions.symmetry_score < n.symmetry_below) {
      notes.push(this.messages.text.symmetry_low);
    }

    return notes;
  }

  private fail(logger: AnalysisLogger, code: ReasonCode, key: MessageKey, timings: StageTimings): AnalysisResult {
    logger.addReason(code);
    logger.addReason(ReasonCode.E_ABSTAIN);
    logger.finalizeAndLog({
      ok: false,
      abstain: true,
      label: "meh",
      confidence: 0,
      composite: null,
      timings_ms: timings
    });

    return {
      ok: false,
      axes: null,
      label: "meh",
      confidence: 0,
      reasons: [this.messages.text[key]],
      abstain: true,
      model_version: this.config.model_version
    };
  }
}
