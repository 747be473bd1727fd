/**
 * FaceAnalyzer: detection followed by validation in a single call.
 *
 * A null result means "no face suitable for processing", not necessarily that
 * the frame has no face. Detector failures are folded into null as well, so
 * the frame pipeline never sees an exception from this stage.
 */

import type { FaceAnalysis, FaceDescriptor, Frame } from "./types.js";
import type { FaceValidator } from "./face-validator.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

// ─── Detector Interface ─────────────────────────────────────────────────────────

export interface FaceDetector {
  /** Find the most relevant face in the frame, or null when there is none. */
  detect(frame: Frame): Promise<FaceDescriptor | null>;
}

// ─── Analyzer ───────────────────────────────────────────────────────────────────

export interface FrameAnalyzing {
  analyze(frame: Frame): Promise<FaceAnalysis | null>;
}

export class FaceAnalyzer implements FrameAnalyzing {
  private readonly detector: FaceDetector;
  private readonly validator: FaceValidator;
  private readonly logger: Logger;

  constructor(
    detector: FaceDetector,
    validator: FaceValidator,
    logger: Logger = silentLogger,
  ) {
    this.detector = detector;
    this.validator = validator;
    this.logger = logger;
  }

  async analyze(frame: Frame): Promise<FaceAnalysis | null> {
    let face: FaceDescriptor | null;
    try {
      face = await this.detector.detect(frame);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Detector failed on frame ${frame.header.seq}: ${errMsg}`);
      return null;
    }

    if (!face) return null;

    const result = this.validator.validate(face);
    if (!result.valid) return null;

    return { face, quality: result.quality };
  }
}
