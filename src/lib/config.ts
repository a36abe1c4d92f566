// src/lib/config.ts
import type { ChartKind } from "./types";

export const CHART_TITLE = "Test graph from csv file";

export const DEFAULT_CHART_KIND: ChartKind = "line";
export const DEFAULT_FILENAME = "upload.csv";

export const CSV_DELIMITER = ",";
export const HIST_BINS = 10;

// radio group on the create-graph page; "Bar" draws the histogram
export const CHART_OPTIONS: { label: string; value: ChartKind }[] = [
  { label: "Line", value: "line" },
  { label: "Bar", value: "histogram" },
  { label: "Scatter", value: "scatter" },
];
