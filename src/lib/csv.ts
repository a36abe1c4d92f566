// src/lib/csv.ts
import Papa from "papaparse";

import type { Column, TabularValue } from "./types";
import { EmptyInputError, EncodingError, MalformedRowError } from "./errors";
import { CSV_DELIMITER } from "./config";
import { inferColumn } from "./stats";

const UTF8_NAMES = new Set(["utf-8", "utf8"]);

const isBlank = (rec: string[]) => rec.length === 1 && rec[0] === "";

function decodeText(bytes: Uint8Array, encoding: string) {
  if (!UTF8_NAMES.has(encoding.toLowerCase())) {
    throw new EncodingError(`Unsupported encoding "${encoding}"`);
  }
  try {
    // fatal: reject invalid sequences instead of substituting U+FFFD
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new EncodingError("File is not valid UTF-8");
  }
}

/**
 * Parses comma-separated UTF-8 text into typed columns. The first record is the header;
 * a failure anywhere means no table at all.
 */
export function parseCsv(bytes: Uint8Array, encoding = "utf-8"): TabularValue {
  if (bytes.length === 0) throw new EmptyInputError();
  const text = decodeText(bytes, encoding);

  // blank lines are resolved below, so papaparse's error rows index `res.data` directly
  const res = Papa.parse<string[]>(text, { delimiter: CSV_DELIMITER, skipEmptyLines: false });
  const records = res.data;

  // papaparse keeps going past bad quoting; record where, then fail on the first bad row
  const quoteErrors = new Map<number, string>();
  for (const e of res.errors) {
    const at = typeof e.row === "number" ? e.row : -1;
    if (e.type === "Quotes" && !quoteErrors.has(at)) quoteErrors.set(at, e.message);
  }

  let end = records.length;
  while (end > 0 && isBlank(records[end - 1])) end--;
  let start = 0;
  while (start < end && isBlank(records[start])) start++;
  if (start === end) throw new EmptyInputError();

  const header = records[start].map((h) => h.trim());
  const headerQuote = quoteErrors.get(start);
  if (headerQuote !== undefined) throw new MalformedRowError(0, headerQuote);
  const seen = new Set<string>();
  for (const h of header) {
    if (seen.has(h)) throw new MalformedRowError(0, `duplicate column "${h}"`);
    seen.add(h);
  }

  const cells: string[][] = header.map(() => []);
  let row = 0;
  for (let i = start + 1; i < end; i++) {
    const rec = records[i];
    // a blank line is an empty cell in a one-column file; elsewhere it is skipped
    if (isBlank(rec) && header.length > 1) continue;
    row++;
    const quoteMsg = quoteErrors.get(i);
    if (quoteMsg !== undefined) throw new MalformedRowError(row, quoteMsg);
    if (rec.length !== header.length) {
      throw new MalformedRowError(row, `expected ${header.length} field(s), found ${rec.length}`);
    }
    rec.forEach((v, j) => cells[j].push(v));
  }
  // a quote error papaparse placed on a record not read above still fails the file
  if (quoteErrors.size > 0) {
    throw new MalformedRowError(Math.max(row, 1), Array.from(quoteErrors.values())[0]);
  }

  const data = new Map<string, Column>();
  header.forEach((h, j) => data.set(h, inferColumn(cells[j])));
  return { columns: header, data, rowCount: row };
}
