/**
 * FrameCollector: picks the best face out of a short collection window.
 *
 * The first qualifying candidate opens a window. Later candidates replace the
 * current best only when strictly better. The window closes and emits its best
 * candidate when either:
 *   - a candidate reaches the high-water mark (early exit), or
 *   - more than `windowMs` has elapsed since the window opened.
 *
 * Invariant: `startTime` is set if and only if `best` is set.
 *
 * process() and reset() are synchronous and never interleave. The
 * orchestrator is the only caller.
 */

import type { CollectorConfig, CollectorResult, FaceCandidate } from "./types.js";

/** Progress reported while a window is still open never reaches 1.0. */
const MAX_OPEN_WINDOW_PROGRESS = 0.99;

export type Clock = () => number;

const defaultClock: Clock = () => performance.now();

export class FrameCollector {
  private readonly config: CollectorConfig;
  private readonly now: Clock;
  private windowStart: number | null;
  private bestCandidate: FaceCandidate | null;

  constructor(config: CollectorConfig, clock: Clock = defaultClock) {
    this.config = config;
    this.now = clock;
    this.windowStart = null;
    this.bestCandidate = null;
  }

  /** Clock reading when the current window opened, or null when no window is open. */
  get startTime(): number | null {
    return this.windowStart;
  }

  get best(): FaceCandidate | null {
    return this.bestCandidate;
  }

  process(candidate: FaceCandidate): CollectorResult {
    const now = this.now();

    if (this.windowStart === null || this.bestCandidate === null) {
      this.windowStart = now;
      this.bestCandidate = candidate;
    } else if (candidate.quality > this.bestCandidate.quality) {
      this.bestCandidate = candidate;
    }

    const elapsed = now - this.windowStart;

    if (
      candidate.quality >= this.config.highWaterMark ||
      elapsed > this.config.windowMs
    ) {
      const winner = this.bestCandidate;
      this.reset();
      return { winner, progress: 1.0 };
    }

    return {
      winner: null,
      progress: Math.min(elapsed / this.config.windowMs, MAX_OPEN_WINDOW_PROGRESS),
    };
  }

  /** Close the window without emitting. Safe to call when already empty. */
  reset(): void {
    this.windowStart = null;
    this.bestCandidate = null;
  }
}
