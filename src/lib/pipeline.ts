// src/lib/pipeline.ts
import type { ChartSpec, PipelineEvent, PipelineOutcome } from "./types";
import { DecodeError, ParseError, PipelineError, isPipelineError } from "./errors";
import { decodeTransport } from "./transport";
import { parseCsv } from "./csv";
import { buildChart, parseChartKind } from "./charts";

/** decode → parse → validate kind → build. Throws the first stage failure. */
export function createGraph(content: string, chartKind: string): ChartSpec {
  const { bytes } = decodeTransport(content);
  const table = parseCsv(bytes);
  return buildChart(table, { chartKind: parseChartKind(chartKind) });
}

export function describeFailure(e: PipelineError, filename: string) {
  if (e instanceof DecodeError) return `Could not read file ${filename}`;
  if (e instanceof ParseError) return `Could not parse ${filename}: ${e.message}`;
  return e.message;
}

/**
 * Boundary entry point for one upload / chart-type event. `content: null` means nothing
 * has been uploaded yet, which is not a failure.
 */
export function runPipeline(event: PipelineEvent): PipelineOutcome {
  if (event.content === null) return { status: "not-ready" };
  try {
    return { status: "ready", chart: createGraph(event.content, event.chartKind) };
  } catch (e) {
    if (!isPipelineError(e)) throw e;
    return { status: "error", error: { code: e.code, message: describeFailure(e, event.filename) } };
  }
}
