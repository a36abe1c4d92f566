// src/lib/stats.ts
import type { Column } from "./types";

/** ======================= Type Coercion & Detection ======================= */

const NUMERIC_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isNumericCell(s: string) {
  const t = s.trim();
  // "1e999" matches but overflows to Infinity
  return NUMERIC_RE.test(t) && Number.isFinite(Number(t));
}

/**
 * Decides a column's type once, from all of its cells. Numeric when every non-empty
 * cell is a number literal; blanks become null. Anything else keeps the raw strings.
 */
export function inferColumn(cells: string[]): Column {
  let filled = 0;
  for (const c of cells) {
    if (c.trim() === "") continue;
    if (!isNumericCell(c)) return { kind: "string", values: [...cells] };
    filled++;
  }
  if (cells.length > 0 && filled === 0) return { kind: "string", values: [...cells] };
  return {
    kind: "number",
    values: cells.map((c) => (c.trim() === "" ? null : Number(c.trim()))),
  };
}

/** ======================= Histogram helpers ======================= */

export function histogram(values: (number | null)[], bins = 10): { bins: number[]; counts: number[]; edges: number[] } {
  const nums = values.filter((v): v is number => v !== null && Number.isFinite(v));
  if (nums.length === 0) return { bins: [], counts: [], edges: [] };
  const min = nums.reduce((a, v) => Math.min(a, v), Infinity);
  const max = nums.reduce((a, v) => Math.max(a, v), -Infinity);
  const width = (max - min) || 1;
  const edges = Array.from({ length: bins + 1 }, (_, i) => min + (i * width) / bins);
  const counts: number[] = Array(bins).fill(0);
  for (const v of nums) {
    const idx = Math.min(bins - 1, Math.max(0, Math.floor(((v - min) / width) * bins)));
    counts[idx]++;
  }
  const centers = counts.map((_, i) => (edges[i] + edges[i + 1]) / 2);
  return { bins: centers, counts, edges };
}

// distinct values in order of first appearance
export function countCategories(values: string[]) {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return Array.from(counts, ([name, count]) => ({ name, count }));
}
