// src/lib/types.ts
export type UploadPayload = { content: string; filename: string };

export type Transported = { contentType: string; bytes: Uint8Array };

export type NumericColumn = { kind: "number"; values: (number | null)[] };
export type TextColumn = { kind: "string"; values: string[] };
export type Column = NumericColumn | TextColumn;

export type SeriesValues = Column["values"];

export type TabularValue = {
  columns: string[];            // header order
  data: Map<string, Column>;
  rowCount: number;
};

export type ChartKind = "line" | "scatter" | "histogram";

export type ChartRequest = { chartKind: ChartKind };

export type ChartSpec =
  | { kind: "line"; series: { x: SeriesValues; y: SeriesValues }; title: string }
  | { kind: "scatter"; series: { x: SeriesValues; y: SeriesValues }; title: string }
  | { kind: "histogram"; series: { x: SeriesValues }; title: string };

// content is null until a file has been uploaded
export type PipelineEvent = Omit<UploadPayload, "content"> & {
  content: UploadPayload["content"] | null;
  chartKind: string;
};

export type PipelineErrorCode =
  | "decode_error"
  | "empty_input"
  | "malformed_row"
  | "encoding_error"
  | "missing_column"
  | "unknown_chart_kind";

export type PipelineOutcome =
  | { status: "not-ready" }
  | { status: "ready"; chart: ChartSpec }
  | { status: "error"; error: { code: PipelineErrorCode; message: string } };
