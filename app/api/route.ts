import { NextResponse } from "next/server";
import { analysisConfigFromEnv } from "@/lib/analysis/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  const config = analysisConfigFromEnv();
  return NextResponse.json({
    service: "facetier",
    version: config.model_version,
    description: "Face photo quality scoring and style-tier classification"
  });
}
