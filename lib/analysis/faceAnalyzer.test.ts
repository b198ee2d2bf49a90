import { describe, it, expect } from "vitest";
import sharp from "sharp";
import type { StyleClassifier } from "./classifier/styleClassifier";
import { buildAnalysisConfig, type AnalysisConfigOverrides } from "./config";
import { DetectorStateError, type FaceDetector } from "./detection/faceDetector";
import { FaceAnalyzer } from "./faceAnalyzer";
import { MESH_POINT_COUNT, MeshIndex } from "./geometry/landmarks";
import { messagesFor } from "./messages";
import type { AnalysisSummary, FaceBox, FaceDetection, Frame, Point3D } from "./types";

class FakeDetector implements FaceDetector {
  readonly name = "fake";
  initialized = 0;
  released = 0;
  seen: Frame[] = [];

  constructor(private readonly detection: FaceDetection | null) {}

  async initialize(): Promise<void> {
    this.initialized += 1;
  }

  detect(frame: Frame): FaceDetection | null {
    this.seen.push(frame);
    return this.detection;
  }

  async release(): Promise<void> {
    this.released += 1;
  }
}

type XY = readonly [number, number];

function mkMesh(overrides: Partial<Record<number, XY>> = {}): Point3D[] {
  const base: Record<number, XY> = {
    [MeshIndex.LEFT_EYE_OUTER]: [30, 40],
    [MeshIndex.RIGHT_EYE_OUTER]: [70, 40],
    [MeshIndex.NOSE_TIP]: [50, 60],
    [MeshIndex.CHIN]: [55, 90],
    [MeshIndex.LEFT_JAW]: [30, 60],
    [MeshIndex.RIGHT_JAW]: [70, 60],
    [MeshIndex.LEFT_MOUTH]: [40, 75],
    [MeshIndex.RIGHT_MOUTH]: [60, 75],
    [MeshIndex.LEFT_CHEEKBONE]: [25, 55],
    [MeshIndex.RIGHT_CHEEKBONE]: [75, 55],
    [MeshIndex.FOREHEAD]: [50, 10],
    ...overrides
  };
  return Array.from({ length: MESH_POINT_COUNT }, (_, i) => {
    const p = base[i] ?? [50, 50];
    return { x: p[0], y: p[1], z: 0 };
  });
}

function mkFrame(value: number, width = 100, height = 100): Frame {
  return { width, height, scale: 1, gray: new Uint8Array(width * height).fill(value) };
}

const FACE_BOX: FaceBox = { x: 18, y: 18, w: 64, h: 64 };

function mkDetection(overrides: Partial<FaceDetection> = {}): FaceDetection {
  return { box: FACE_BOX, mesh: null, confidence: 0.9, ...overrides };
}

async function mkAnalyzer(
  detection: FaceDetection | null,
  opts: { config?: AnalysisConfigOverrides; classifier?: StyleClassifier } = {}
) {
  const logs: unknown[] = [];
  let clock = 0;
  const detector = new FakeDetector(detection);
  const analyzer = new FaceAnalyzer({
    detector,
    classifier: opts.classifier,
    config: buildAnalysisConfig(opts.config),
    log: (o) => logs.push(o),
    nowMs: () => (clock += 1)
  });
  await analyzer.initialize();
  return { analyzer, detector, logs };
}

function onlySummary(logs: unknown[]): AnalysisSummary {
  expect(logs).toHaveLength(1);
  const [first] = logs;
  if (!first || typeof first !== "object" || !("reason_code_counts" in first)) {
    throw new Error("expected a summary log");
  }
  return first as AnalysisSummary;
}

describe("FaceAnalyzer lifecycle", () => {
  it("rejects analysis before initialize", () => {
    const analyzer = new FaceAnalyzer({ detector: new FakeDetector(null) });
    expect(() => analyzer.analyzeImage(mkFrame(128))).toThrow(DetectorStateError);
  });

  it("initializes and releases the detector once", async () => {
    const { analyzer, detector } = await mkAnalyzer(null);
    await analyzer.initialize();
    await analyzer.release();
    await analyzer.release();
    expect(detector.initialized).toBe(1);
    expect(detector.released).toBe(1);
    expect(analyzer.currentState).toBe("released");
  });

  it("cannot be used or re-initialized after release", async () => {
    const { analyzer } = await mkAnalyzer(null);
    await analyzer.release();
    expect(() => analyzer.analyzeImage(mkFrame(128))).toThrow(DetectorStateError);
    await expect(analyzer.initialize()).rejects.toBeInstanceOf(DetectorStateError);
  });
});

describe("FaceAnalyzer.analyzeImage", () => {
  it("abstains when no face is detected", async () => {
    const { analyzer, logs } = await mkAnalyzer(null);
    expect(analyzer.analyzeImage(mkFrame(128))).toEqual({
      ok: false,
      axes: null,
      label: "meh",
      confidence: 0,
      reasons: ["no face detected"],
      abstain: true,
      model_version: "1.0.0"
    });
    expect(onlySummary(logs).reason_code_counts).toEqual({ E_NO_FACE: 1, E_ABSTAIN: 1 });
  });

  it("abstains when the face box lies outside the frame", async () => {
    const { analyzer } = await mkAnalyzer(mkDetection({ box: { x: 500, y: 500, w: 20, h: 20 } }));
    const r = analyzer.analyzeImage(mkFrame(128));
    expect(r.ok).toBe(false);
    expect(r.reasons).toEqual(["could not extract face region"]);
  });

  it("abstains on a face box with non-finite coordinates", async () => {
    const { analyzer, logs } = await mkAnalyzer(mkDetection({ box: { x: Number.NaN, y: 10, w: 40, h: Infinity } }));
    const r = analyzer.analyzeImage(mkFrame(128));
    expect(r).toMatchObject({ ok: false, abstain: true, reasons: ["could not extract face region"] });
    expect(onlySummary(logs).reason_code_counts).toEqual({ E_EMPTY_CROP: 1, E_ABSTAIN: 1 });
  });

  it("localizes failure reasons", async () => {
    const { analyzer } = await mkAnalyzer(null, { config: { locale: "ru" } });
    expect(analyzer.analyzeImage(mkFrame(128)).reasons).toEqual(["лицо не обнаружено"]);
  });

  it("uses neutral pose and jawline axes and omits geometry without a mesh", async () => {
    const { analyzer, logs } = await mkAnalyzer(mkDetection());
    const r = analyzer.analyzeImage(mkFrame(128));

    expect(r.ok).toBe(true);
    expect(r.abstain).toBe(false);
    expect(r.axes?.pose).toBe(50);
    expect(r.axes?.jawline).toBe(50);
    expect(r.axes?.lighting).toBeCloseTo(100, 9);
    expect(r.axes?.sharpness).toBeCloseTo(0, 6);
    expect("pose" in r).toBe(false);
    expect("proportions" in r).toBe(false);
    expect(r.quality?.exposure.exposure_diff).toBe(0);

    // flat crop: sharpness and contrast both "very bad"
    expect(r.label).toBe("trash");
    expect(r.reasons).toEqual([
      "good lighting",
      "low sharpness",
      "suboptimal pose/angle",
      "weak jawline",
      "low contrast"
    ]);
    expect(onlySummary(logs).reason_code_counts).toEqual({ E_NO_MESH: 1, E_OK: 1 });
  });

  it("abstains on low detector confidence with everything else fixed", async () => {
    const confident = await mkAnalyzer(mkDetection({ confidence: 0.3 }));
    expect(confident.analyzer.analyzeImage(mkFrame(128)).abstain).toBe(false);

    const unsure = await mkAnalyzer(mkDetection({ confidence: 0.29 }));
    const r = unsure.analyzer.analyzeImage(mkFrame(128));
    expect(r.abstain).toBe(true);
    expect(r.ok).toBe(true);
    expect(onlySummary(unsure.logs).reason_code_counts).toEqual({
      E_NO_MESH: 1,
      E_LOW_DETECTOR_CONFIDENCE: 1,
      E_ABSTAIN: 1
    });
  });

  it("abstains when the axes average below 20", async () => {
    const { analyzer } = await mkAnalyzer(mkDetection(), { config: { axes: { missing_mesh_default: 0 } } });
    const r = analyzer.analyzeImage(mkFrame(60));
    expect(r.abstain).toBe(true);
  });

  it("appends a signed exposure note", async () => {
    const { analyzer } = await mkAnalyzer(mkDetection());
    const r = analyzer.analyzeImage(mkFrame(60));
    expect(r.reasons.at(-1)).toBe("exposure -68");
  });

  it("returns pose and proportions when a mesh is present", async () => {
    const { analyzer } = await mkAnalyzer(mkDetection({ mesh: mkMesh() }));
    const r = analyzer.analyzeImage(mkFrame(128));
    const pose = r.pose;
    if (!pose) throw new Error("expected pose");

    expect(pose.yaw).toBeCloseTo(0, 9);
    expect(r.proportions?.symmetry_score).toBe(100);
    expect(r.abstain).toBe(false);
    // chin sits almost straight below the nose: pitch just under 45
    expect(r.reasons.at(-1)).toBe(messagesFor("en").pitch(pose.pitch));
    expect(r.reasons.at(-1)).toBe("head tilted (pitch≈44.6°)");
  });

  it("abstains on an extreme yaw and notes it", async () => {
    const { analyzer, logs } = await mkAnalyzer(mkDetection({ mesh: mkMesh({ [MeshIndex.NOSE_TIP]: [75, 60] }) }));
    const r = analyzer.analyzeImage(mkFrame(128));
    const pose = r.pose;
    if (!pose) throw new Error("expected pose");

    expect(pose.yaw).toBeGreaterThan(45);
    expect(r.abstain).toBe(true);
    expect(r.reasons).toContain(messagesFor("en").yaw(pose.yaw));
    expect(onlySummary(logs).reason_code_counts).toEqual({ E_EXTREME_POSE: 1, E_ABSTAIN: 1 });
  });

  it("notes low facial symmetry last", async () => {
    const { analyzer } = await mkAnalyzer(
      mkDetection({ mesh: mkMesh({ [MeshIndex.RIGHT_MOUTH]: [90, 20] }) })
    );
    const r = analyzer.analyzeImage(mkFrame(128));
    expect(r.proportions?.symmetry_score).toBeLessThan(70);
    expect(r.reasons.at(-1)).toBe("low facial symmetry");
  });

  it("delegates labelling to an injected classifier", async () => {
    const classifier: StyleClassifier = {
      kind: "fixed",
      classify: () => ({ label: "god", confidence: 0.99, composite: 99, tags: [], reasons: ["fixed"] })
    };
    const { analyzer } = await mkAnalyzer(mkDetection(), { classifier });
    const r = analyzer.analyzeImage(mkFrame(128));
    expect(r.label).toBe("god");
    expect(r.confidence).toBe(0.99);
    expect(r.reasons).toEqual(["fixed"]);
  });

  it("logs per-stage timings from the injected clock", async () => {
    const { analyzer, logs } = await mkAnalyzer(mkDetection());
    analyzer.analyzeImage(mkFrame(128), { request_id: "req-7" });
    const summary = onlySummary(logs);
    expect(summary.request_id).toBe("req-7");
    expect(summary.timings_ms.detect_ms).toBe(1);
    expect(summary.timings_ms.total_ms).toBeGreaterThan(summary.timings_ms.detect_ms);
  });
});

describe("FaceAnalyzer.analyzeBytes", () => {
  it("abstains on undecodable bytes", async () => {
    const { analyzer, detector, logs } = await mkAnalyzer(mkDetection());
    const r = await analyzer.analyzeBytes(Uint8Array.from([0, 1, 2, 3]));
    expect(r.ok).toBe(false);
    expect(r.reasons).toEqual(["could not load image"]);
    expect(detector.seen).toHaveLength(0);
    expect(onlySummary(logs).reason_code_counts).toEqual({ E_DECODE_FAILED: 1, E_ABSTAIN: 1 });
  });

  it("abstains on a zero-byte upload", async () => {
    const { analyzer, detector, logs } = await mkAnalyzer(mkDetection());
    const r = await analyzer.analyzeBytes(new Uint8Array(0));
    expect(r).toMatchObject({ ok: false, abstain: true, reasons: ["could not load image"] });
    expect(detector.seen).toHaveLength(0);
    expect(onlySummary(logs).reason_code_counts).toEqual({ E_DECODE_FAILED: 1, E_ABSTAIN: 1 });
  });

  it("decodes and hands the frame to the detector", async () => {
    const png = await sharp({ create: { width: 100, height: 80, channels: 3, background: { r: 128, g: 128, b: 128 } } })
      .png()
      .toBuffer();
    const { analyzer, detector } = await mkAnalyzer(mkDetection({ box: { x: 10, y: 10, w: 50, h: 50 } }));
    const r = await analyzer.analyzeBytes(new Uint8Array(png));

    expect(r.ok).toBe(true);
    expect(detector.seen).toHaveLength(1);
    expect(detector.seen[0].width).toBe(100);
    expect(detector.seen[0].scale).toBe(1);
  });
});
