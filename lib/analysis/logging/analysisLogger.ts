/*
  facetier — Per-analysis structured logging

  One analysis produces exactly one "facetier.analysis.summary" object.
  Stage payloads ("facetier.analysis.debug") are only emitted with debug on.
  Nothing is printed unless a sink is injected.
*/

import { ALL_REASON_CODES, type ReasonCodeString, type StyleLabel } from "../config";
import type { AnalysisSummary, AnalysisTimingsMs, ReasonCodeCounts } from "../types";

/** Sink for structured log objects */
export type StructuredLogger = (obj: unknown) => void;

export interface AnalysisLoggerInit {
  readonly request_id: string;
  readonly config_version: string;
  readonly model_version: string;
  readonly log?: StructuredLogger;
  readonly debug?: boolean;
}

export interface AnalysisOutcome {
  readonly ok: boolean;
  readonly abstain: boolean;
  readonly label: StyleLabel;
  readonly confidence: number;
  readonly composite: number | null;
  readonly timings_ms: AnalysisTimingsMs;
}

export interface AnalysisLogger {
  addReason(code: ReasonCodeString): void;
  debugStage(stage: string, payload: unknown): void;
  finalizeAndLog(outcome: AnalysisOutcome): AnalysisSummary;
}

export function createAnalysisLogger(init: AnalysisLoggerInit): AnalysisLogger {
  const counts: Partial<Record<ReasonCodeString, number>> = {};
  const sink = init.log;

  return {
    addReason(code) {
      counts[code] = (counts[code] ?? 0) + 1;
    },

    debugStage(stage, payload) {
      if (!init.debug || !sink) return;
      sink({ kind: "facetier.analysis.debug", request_id: init.request_id, stage, payload });
    },

    finalizeAndLog(outcome) {
      const summary: AnalysisSummary = {
        request_id: init.request_id,
        config_version: init.config_version,
        model_version: init.model_version,
        ...outcome,
        reason_code_counts: { ...counts }
      };
      sink?.({ kind: "facetier.analysis.summary", ...summary });
      return summary;
    }
  };
}

/** Sum reason-code counts over several analyses, e.g. one batch request. */
export function mergeReasonCodeCounts(...maps: ReadonlyArray<ReasonCodeCounts>): ReasonCodeCounts {
  const total: Partial<Record<ReasonCodeString, number>> = {};
  for (const code of ALL_REASON_CODES) {
    let sum = 0;
    let seen = false;
    for (const m of maps) {
      const n = m[code];
      if (n === undefined || !Number.isFinite(n)) continue;
      sum += Math.max(0, Math.trunc(n));
      seen = true;
    }
    if (seen) total[code] = sum;
  }
  return total;
}

/** JSON-lines sink for route handlers: `{ ts, event, ...obj }` per line. */
export function jsonLineLogger(event: string): StructuredLogger {
  return (obj) => {
    const fields = obj !== null && typeof obj === "object" ? obj : { payload: obj };
    console.log(JSON.stringify({ ts: new Date().toISOString(), event, ...fields }));
  };
}
