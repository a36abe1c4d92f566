// src/lib/errors.ts
import type { PipelineErrorCode } from "./types";

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Transport string is not `<type>,<base64>` or the payload is not valid base64. */
export class DecodeError extends PipelineError {
  readonly code = "decode_error";
}

/** ======================= Parse ======================= */

export abstract class ParseError extends PipelineError {}

export class EmptyInputError extends ParseError {
  readonly code = "empty_input";
  constructor() { super("File is empty"); }
}

export class MalformedRowError extends ParseError {
  readonly code = "malformed_row";
  // 1-based data row; 0 is the header
  constructor(readonly row: number, detail: string) {
    super(row === 0 ? `Header: ${detail}` : `Row ${row}: ${detail}`);
  }
}

export class EncodingError extends ParseError {
  readonly code = "encoding_error";
}

/** ======================= Validation ======================= */

export abstract class ValidationError extends PipelineError {}

export class MissingColumnError extends ValidationError {
  readonly code = "missing_column";
  constructor(readonly columns: string[]) {
    super(`Missing required column(s): ${columns.map((c) => `"${c}"`).join(", ")}`);
  }
}

export class UnknownChartKindError extends ValidationError {
  readonly code = "unknown_chart_kind";
  constructor(readonly chartKind: string) {
    super(`Unknown chart type "${chartKind}"`);
  }
}

export function isPipelineError(e: unknown): e is PipelineError {
  return e instanceof PipelineError;
}
