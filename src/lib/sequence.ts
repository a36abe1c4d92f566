// src/lib/sequence.ts

/**
 * Tags in-flight requests so only the answer to the latest one is applied.
 * `invalidate` drops everything in flight (e.g. after the upload is cleared).
 */
export function createRequestSequence() {
  let latest = 0;
  return {
    next: () => ++latest,
    isCurrent: (id: number) => id === latest,
    invalidate: () => { latest++; },
  };
}

export type RequestSequence = ReturnType<typeof createRequestSequence>;
