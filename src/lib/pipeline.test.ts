import { describe, expect, it } from "vitest";

import type { UploadPayload } from "./types";
import { createGraph, runPipeline } from "./pipeline";
import { decodeTransport } from "./transport";
import { parseCsv } from "./csv";
import { DecodeError } from "./errors";

const toContent = (csv: string) => `data:text/csv;base64,${Buffer.from(csv, "utf-8").toString("base64")}`;

describe("runPipeline", () => {
  it("is not ready before anything is uploaded", () => {
    expect(runPipeline({ content: null, filename: "", chartKind: "line" })).toEqual({ status: "not-ready" });
  });

  it("builds a scatter chart from an uploaded csv", () => {
    expect(runPipeline({ content: "text/csv,eCx5CjEsMgozLDQ=", filename: "data.csv", chartKind: "scatter" })).toEqual({
      status: "ready",
      chart: { kind: "scatter", series: { x: [1, 3], y: [2, 4] }, title: "Test graph from csv file" },
    });
  });

  it("accepts an upload payload plus the chart kind", () => {
    const upload: UploadPayload = { content: "text/csv,eCx5CjEsMgozLDQ=", filename: "data.csv" };
    expect(runPipeline({ ...upload, chartKind: "histogram" })).toEqual({
      status: "ready",
      chart: { kind: "histogram", series: { x: [1, 3] }, title: "Test graph from csv file" },
    });
  });

  it("carries the original columns through a line chart", () => {
    const xs = [0, 1.5, -2, 1000];
    const ys = [10, 20, 30, 0.25];
    const csv = ["x,y", ...xs.map((x, i) => `${x},${ys[i]}`)].join("\n");
    const outcome = runPipeline({ content: toContent(csv), filename: "data.csv", chartKind: "line" });
    expect(outcome).toEqual({
      status: "ready",
      chart: { kind: "line", series: { x: xs, y: ys }, title: "Test graph from csv file" },
    });
  });

  it("draws an empty chart for a header-only file", () => {
    const outcome = runPipeline({ content: toContent("x,y\n"), filename: "data.csv", chartKind: "scatter" });
    expect(outcome).toEqual({
      status: "ready",
      chart: { kind: "scatter", series: { x: [], y: [] }, title: "Test graph from csv file" },
    });
  });

  it("reports an unreadable transport string", () => {
    expect(runPipeline({ content: "garbage", filename: "data.csv", chartKind: "line" })).toEqual({
      status: "error",
      error: { code: "decode_error", message: "Could not read file data.csv" },
    });
  });

  it("reports the malformed row", () => {
    const outcome = runPipeline({ content: toContent("x,y\n1,2\n3,4\n5"), filename: "data.csv", chartKind: "line" });
    expect(outcome).toEqual({
      status: "error",
      error: { code: "malformed_row", message: "Could not parse data.csv: Row 3: expected 2 field(s), found 1" },
    });
  });

  it("reports an empty file", () => {
    const outcome = runPipeline({ content: "text/csv,", filename: "empty.csv", chartKind: "line" });
    expect(outcome).toEqual({
      status: "error",
      error: { code: "empty_input", message: "Could not parse empty.csv: File is empty" },
    });
  });

  it("reports missing columns", () => {
    const outcome = runPipeline({ content: toContent("a,b\n1,2"), filename: "data.csv", chartKind: "histogram" });
    expect(outcome).toEqual({
      status: "error",
      error: { code: "missing_column", message: 'Missing required column(s): "x"' },
    });
  });

  it("reports an unknown chart kind instead of drawing nothing", () => {
    const outcome = runPipeline({ content: toContent("x,y\n1,2"), filename: "data.csv", chartKind: "pie" });
    expect(outcome).toEqual({
      status: "error",
      error: { code: "unknown_chart_kind", message: 'Unknown chart type "pie"' },
    });
  });

  it("gives the same answer for repeated calls", () => {
    const event = { content: toContent("x\n3\n1"), filename: "data.csv", chartKind: "histogram" };
    expect(runPipeline(event)).toEqual(runPipeline(event));
  });
});

describe("decode then parse", () => {
  it.each([
    ["x,y\n1,2\n3,4", ["x", "y"], 2],
    ["a,b,c\n1,2,3", ["a", "b", "c"], 1],
    ["only", ["only"], 0],
    ["name,score\nann,1\nbob,2\ncid,3", ["name", "score"], 3],
  ])("keeps the header of %j", (csv, header, rows) => {
    const table = parseCsv(decodeTransport(toContent(csv)).bytes);
    expect(table.columns).toEqual(header);
    expect(table.rowCount).toBe(rows);
    expect(rows).toBe(csv.split("\n").length - 1);
  });
});

describe("createGraph", () => {
  it("throws the first stage failure", () => {
    expect(() => createGraph("no comma here", "line")).toThrow(DecodeError);
  });
});
