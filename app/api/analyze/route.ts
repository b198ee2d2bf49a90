import { randomUUID } from "node:crypto";
import { NextResponse } from "next/server";

import {
  analysisConfigFromEnv,
  analyzeUpload,
  fileBytes,
  isBadRequest,
  parseLandmarksField,
  withoutQuality
} from "@/lib/analysis/http";
import { jsonLineLogger } from "@/lib/analysis/logging/analysisLogger";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/**
 * POST /api/analyze
 * multipart/form-data:
 * - file: image bytes
 * - landmarks (optional): JSON face payload from an upstream face-mesh run
 *
 * `?include=quality` keeps the raw quality report in the response.
 */
export async function POST(req: Request) {
  const requestId = randomUUID();
  const includeQuality = new URL(req.url).searchParams.get("include") === "quality";

  try {
    const form = await req.formData();
    const bytes = await fileBytes(form.get("file"), "file");
    const landmarks = parseLandmarksField(form.get("landmarks"));

    const result = await analyzeUpload({
      bytes,
      landmarks,
      config: analysisConfigFromEnv(),
      log: jsonLineLogger("analyze"),
      requestId
    });

    return NextResponse.json(includeQuality ? result : withoutQuality(result));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    if (isBadRequest(e)) {
      return NextResponse.json({ ok: false, error: message }, { status: 400 });
    }
    console.error("[analyze] failed", { requestId, error: message });
    return NextResponse.json({ ok: false, error: `Analysis failed: ${message}` }, { status: 500 });
  }
}
