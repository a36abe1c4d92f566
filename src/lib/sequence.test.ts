import { describe, expect, it } from "vitest";

import { createRequestSequence } from "./sequence";

describe("createRequestSequence", () => {
  it("keeps only the latest request current", () => {
    const seq = createRequestSequence();
    const first = seq.next();
    const second = seq.next();
    expect(seq.isCurrent(first)).toBe(false);
    expect(seq.isCurrent(second)).toBe(true);
  });

  it("drops a request still in flight when invalidated", () => {
    const seq = createRequestSequence();
    const pending = seq.next();
    seq.invalidate();
    expect(seq.isCurrent(pending)).toBe(false);
  });

  it("does not share counters between sequences", () => {
    const a = createRequestSequence();
    const b = createRequestSequence();
    const id = a.next();
    b.next();
    b.next();
    expect(a.isCurrent(id)).toBe(true);
  });
});
