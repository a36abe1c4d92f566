// src/app/api/create-graph/route.ts
export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { NextResponse } from "next/server";
import { z } from "zod";

import { runPipeline } from "@/lib/pipeline";
import { DEFAULT_CHART_KIND, DEFAULT_FILENAME } from "@/lib/config";

const CreateGraphBody = z.object({
  content: z.string().nullable(),
  filename: z.string().min(1).default(DEFAULT_FILENAME),
  chartKind: z.string().min(1).default(DEFAULT_CHART_KIND),
});

function err(message: string, status = 400) { return NextResponse.json({ error: message }, { status }); }

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return err("Body must be JSON.");
  }

  const parsed = CreateGraphBody.safeParse(body);
  if (!parsed.success) {
    return err(parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "));
  }

  const { content, filename, chartKind } = parsed.data;
  try {
    const outcome = runPipeline({ content, filename, chartKind });
    if (outcome.status === "error") {
      console.warn(`[create-graph] ${filename}: ${outcome.error.code}`);
      return NextResponse.json(outcome, { status: 422 });
    }
    return NextResponse.json(outcome);
  } catch (e) {
    console.error("[create-graph]", filename, e);
    return err("Graph creation failed.", 500);
  }
}
