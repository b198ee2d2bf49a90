import { describe, it, expect } from "vitest";
import { ReasonCode } from "../config";
import { createAnalysisLogger, mergeReasonCodeCounts } from "./analysisLogger";

const TIMINGS = { decode_ms: 1, detect_ms: 2, crop_ms: 0, metrics_ms: 3, geometry_ms: 0, classify_ms: 1, total_ms: 7 };

describe("createAnalysisLogger", () => {
  it("emits exactly one summary with counted reason codes", () => {
    const logs: unknown[] = [];
    const logger = createAnalysisLogger({
      request_id: "req-1",
      config_version: "cfg",
      model_version: "1.0.0",
      log: (o) => logs.push(o)
    });
    logger.addReason(ReasonCode.E_NO_MESH);
    logger.addReason(ReasonCode.E_OK);
    logger.addReason(ReasonCode.E_NO_MESH);
    logger.debugStage("detect", { skipped: true });

    const summary = logger.finalizeAndLog({
      ok: true,
      abstain: false,
      label: "average",
      confidence: 0.55,
      composite: 55,
      timings_ms: TIMINGS
    });

    expect(summary.reason_code_counts).toEqual({ E_NO_MESH: 2, E_OK: 1 });
    expect(logs).toEqual([{ kind: "facetier.analysis.summary", ...summary }]);
  });

  it("logs stages only in debug mode", () => {
    const logs: unknown[] = [];
    const logger = createAnalysisLogger({
      request_id: "req-2",
      config_version: "cfg",
      model_version: "1.0.0",
      log: (o) => logs.push(o),
      debug: true
    });
    logger.debugStage("axes", { sharpness: 1 });
    expect(logs).toEqual([
      { kind: "facetier.analysis.debug", request_id: "req-2", stage: "axes", payload: { sharpness: 1 } }
    ]);
  });
});

describe("mergeReasonCodeCounts", () => {
  it("sums counts across analyses", () => {
    expect(
      mergeReasonCodeCounts({ E_OK: 1, E_NO_MESH: 1 }, { E_OK: 2 }, { E_NO_FACE: 1, E_ABSTAIN: 1 })
    ).toEqual({ E_OK: 3, E_NO_MESH: 1, E_NO_FACE: 1, E_ABSTAIN: 1 });
  });
});
