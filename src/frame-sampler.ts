/**
 * Frame sampler for the intake gate.
 * Admits at most `maxRate` frames per second of capture time; a rate of 0
 * admits every frame. The gate's busy check still applies on top of this.
 */

export class FrameSampler {
  private readonly intervalSeconds: number; // 1 / maxRate, or 0 when unlimited
  private lastSampledTimestamp: number;

  constructor(maxRate: number) {
    this.intervalSeconds = maxRate > 0 ? 1 / maxRate : 0;
    this.lastSampledTimestamp = -Infinity;
  }

  /**
   * Returns true if a frame with this capture timestamp may enter the pipeline.
   * A timestamp earlier than the last sampled one means the capture clock was
   * restarted; the sampler starts over from it.
   */
  shouldSample(timestamp: number): boolean {
    if (this.intervalSeconds === 0) return true;

    if (timestamp < this.lastSampledTimestamp) {
      this.lastSampledTimestamp = -Infinity;
    }

    if (timestamp - this.lastSampledTimestamp >= this.intervalSeconds) {
      this.lastSampledTimestamp = timestamp;
      return true;
    }
    return false;
  }

  /** Forget the last sampled timestamp. */
  reset(): void {
    this.lastSampledTimestamp = -Infinity;
  }
}
