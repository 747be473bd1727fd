// Property-Based Test: Frame sampler admits at most the configured rate

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { FrameSampler } from "./frame-sampler.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryAdmissionRate = (): fc.Arbitrary<number> => fc.integer({ min: 1, max: 30 });

/** Sorted, unique timestamps simulating realistic frame arrival. */
const arbitraryMonotonicTimestamps = (): fc.Arbitrary<number[]> =>
  fc
    .array(fc.double({ min: 0, max: 30, noNaN: true, noDefaultInfinity: true }), {
      minLength: 2,
      maxLength: 200,
    })
    .map((arr) => {
      const sorted = [...new Set(arr)].sort((a, b) => a - b);
      return sorted.length >= 2 ? sorted : [0, 1];
    });

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("FrameSampler admission rate", () => {
  it("consecutive admitted frames are at least 1/rate seconds apart", () => {
    fc.assert(
      fc.property(arbitraryAdmissionRate(), arbitraryMonotonicTimestamps(), (rate, timestamps) => {
        const sampler = new FrameSampler(rate);
        const admitted = timestamps.filter((ts) => sampler.shouldSample(ts));

        for (let i = 1; i < admitted.length; i++) {
          expect(admitted[i] - admitted[i - 1]).toBeGreaterThanOrEqual(1 / rate - 1e-9);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("the first frame is always admitted", () => {
    fc.assert(
      fc.property(arbitraryAdmissionRate(), arbitraryMonotonicTimestamps(), (rate, timestamps) => {
        expect(new FrameSampler(rate).shouldSample(timestamps[0])).toBe(true);
      }),
      { numRuns: 200 },
    );
  });

  it("rate 0 admits every frame", () => {
    fc.assert(
      fc.property(arbitraryMonotonicTimestamps(), (timestamps) => {
        const sampler = new FrameSampler(0);
        expect(timestamps.every((ts) => sampler.shouldSample(ts))).toBe(true);
      }),
      { numRuns: 100 },
    );
  });
});
