// src/lib/charts.ts
import { z } from "zod";

import type { ChartKind, ChartRequest, ChartSpec, Column, SeriesValues, TabularValue } from "./types";
import { MissingColumnError, UnknownChartKindError } from "./errors";
import { CHART_TITLE, HIST_BINS } from "./config";
import { countCategories, histogram } from "./stats";

// checked in this order; the first kind that matches wins
export const REQUIRED_COLUMNS: ReadonlyArray<readonly [ChartKind, readonly string[]]> = [
  ["line", ["x", "y"]],
  ["scatter", ["x", "y"]],
  ["histogram", ["x"]],
];

export const ChartKindSchema = z.enum(["line", "scatter", "histogram"]);

export function parseChartKind(value: unknown): ChartKind {
  const res = ChartKindSchema.safeParse(value);
  if (!res.success) throw new UnknownChartKindError(String(value));
  return res.data;
}

function copyValues(col: Column): SeriesValues {
  if (col.kind === "number") return [...col.values];
  return [...col.values];
}

/**
 * Validates that the table carries the columns the requested chart needs and builds
 * its specification. Never touches `table`; series are copies.
 */
export function buildChart(table: TabularValue, request: ChartRequest): ChartSpec {
  const entry = REQUIRED_COLUMNS.find(([kind]) => kind === request.chartKind);
  if (!entry) throw new UnknownChartKindError(String(request.chartKind));
  const [kind, required] = entry;

  const missing = required.filter((c) => !table.data.has(c));
  if (missing.length) throw new MissingColumnError(missing);

  const series = (name: string) => {
    const col = table.data.get(name);
    // presence checked above
    return col ? copyValues(col) : [];
  };

  switch (kind) {
    case "line":
    case "scatter":
      return { kind, series: { x: series("x"), y: series("y") }, title: CHART_TITLE };
    case "histogram":
      return { kind, series: { x: series("x") }, title: CHART_TITLE };
  }
}

// -------- plot builders --------
export type PlotPoint = { x: number | string | null; y: number | string | null };
export type HistBar = { bin: number | string; count: number };

function zip(xs: SeriesValues, ys: SeriesValues): PlotPoint[] {
  const n = Math.min(xs.length, ys.length);
  return Array.from({ length: n }, (_, i) => ({ x: xs[i], y: ys[i] }));
}

export function buildLineData(spec: ChartSpec): PlotPoint[] {
  if (spec.kind === "histogram") return [];
  return zip(spec.series.x, spec.series.y);
}

export function buildScatterData(spec: ChartSpec): PlotPoint[] {
  if (spec.kind === "histogram") return [];
  return zip(spec.series.x, spec.series.y).filter((p) => p.x !== null && p.y !== null);
}

function isNumericSeries(values: SeriesValues): values is (number | null)[] {
  return values.every((v) => v === null || typeof v === "number");
}

export function buildHistData(spec: ChartSpec, bins = HIST_BINS): HistBar[] {
  const xs = spec.series.x;
  if (isNumericSeries(xs)) {
    const { bins: centers, counts } = histogram(xs, bins);
    return centers.map((c, i) => ({ bin: c, count: counts[i] }));
  }
  return countCategories(xs.map((v) => String(v))).map((d) => ({ bin: d.name, count: d.count }));
}
