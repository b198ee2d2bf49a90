import { randomUUID } from "node:crypto";
import { NextResponse } from "next/server";

import {
  BadRequestError,
  analysisConfigFromEnv,
  analyzeUpload,
  fileBytes,
  isBadRequest,
  parseLandmarksField
} from "@/lib/analysis/http";
import { jsonLineLogger, mergeReasonCodeCounts } from "@/lib/analysis/logging/analysisLogger";
import type { AnalysisSummary, AxisScores } from "@/lib/analysis/types";
import type { StyleLabel } from "@/lib/analysis/config";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

type BatchItem =
  | { filename: string; ok: boolean; axes: AxisScores | null; label: StyleLabel; confidence: number }
  | { filename: string; ok: false; error: string };

function isSummary(obj: unknown): obj is AnalysisSummary & { kind: string } {
  return (
    !!obj &&
    typeof obj === "object" &&
    "kind" in obj &&
    obj.kind === "facetier.analysis.summary" &&
    "reason_code_counts" in obj
  );
}

/**
 * POST /api/analyze/batch
 * multipart/form-data:
 * - files: repeated image fields
 * - landmarks (optional): JSON array aligned with `files` by index
 *
 * One failing file never fails the batch.
 */
export async function POST(req: Request) {
  const batchId = randomUUID();
  const lineLog = jsonLineLogger("analyze.batch");

  let form: FormData;
  let landmarkList: unknown[];
  try {
    form = await req.formData();
    const raw = parseLandmarksField(form.get("landmarks"));
    if (raw === null) landmarkList = [];
    else if (Array.isArray(raw)) landmarkList = raw;
    else throw new BadRequestError("landmarks must be a JSON array for batch requests");
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    const status = isBadRequest(e) ? 400 : 500;
    return NextResponse.json({ ok: false, error: status === 400 ? message : `Analysis failed: ${message}` }, { status });
  }

  const files = form.getAll("files");
  if (files.length === 0) {
    return NextResponse.json({ ok: false, error: 'multipart field "files" is required' }, { status: 400 });
  }

  const config = analysisConfigFromEnv();
  const summaries: AnalysisSummary[] = [];
  const log = (obj: unknown) => {
    if (isSummary(obj)) summaries.push(obj);
    lineLog(obj);
  };

  const results: BatchItem[] = [];
  for (let i = 0; i < files.length; i++) {
    const entry = files[i];
    const filename = typeof entry === "string" ? `files[${i}]` : entry.name || `files[${i}]`;
    try {
      const bytes = await fileBytes(entry, "files");
      const result = await analyzeUpload({
        bytes,
        landmarks: landmarkList[i] ?? null,
        config,
        log,
        requestId: `${batchId}:${i}`
      });
      results.push({
        filename,
        ok: result.ok,
        axes: result.axes,
        label: result.label,
        confidence: result.confidence
      });
    } catch (e) {
      results.push({ filename, ok: false, error: e instanceof Error ? e.message : String(e) });
    }
  }

  lineLog({
    kind: "facetier.analysis.batch",
    batch_id: batchId,
    files: files.length,
    reason_code_counts: mergeReasonCodeCounts(...summaries.map((s) => s.reason_code_counts))
  });

  return NextResponse.json({ results });
}
