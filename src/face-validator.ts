/**
 * FaceValidator: decides whether a detected face is worth embedding.
 *
 * Rejects faces that are rolled or turned too far, lit too dark or too bright,
 * or scored below the capture-quality floor. Faces without a quality score or
 * brightness measurement are rejected as well.
 */

import type { FaceDescriptor, Point, ValidationConfig } from "./types.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export type FaceRejection =
  | "roll"
  | "yaw"
  | "brightness"
  | "brightness_unavailable"
  | "quality"
  | "quality_unavailable";

export type ValidationResult =
  | { valid: true; quality: number; rollDegrees: number; yaw: number }
  | { valid: false; reason: FaceRejection; detail: string };

/** Detectors report angles like 15.000019; this keeps the bounds inclusive. */
const ANGLE_EPSILON = 0.0002;

/** Scale from eye-midpoint offset (fraction of face width) to the yaw-proxy unit. */
const YAW_PROXY_SCALE = 100;

// ─── Pose Estimation ────────────────────────────────────────────────────────────

/**
 * Roll in degrees: angle of the line from the left eye to the right eye.
 * 0 when the eyes are level; positive when the right eye sits lower.
 */
export function estimateRoll(leftEye: Point, rightEye: Point): number {
  return (
    Math.atan2(rightEye.y - leftEye.y, rightEye.x - leftEye.x) * (180 / Math.PI)
  );
}

/**
 * Yaw proxy: horizontal offset of the nose from the eye midpoint, as a
 * fraction of face width, scaled by 100. 0 for a frontal face.
 */
export function estimateYaw(
  leftEye: Point,
  rightEye: Point,
  nose: Point,
  faceWidth: number,
): number {
  if (faceWidth <= 0) return 0;
  const eyeMidX = (leftEye.x + rightEye.x) / 2;
  return ((nose.x - eyeMidX) / faceWidth) * YAW_PROXY_SCALE;
}

// ─── Validator ──────────────────────────────────────────────────────────────────

export class FaceValidator {
  private readonly config: ValidationConfig;
  private readonly logger: Logger;

  constructor(config: ValidationConfig, logger: Logger = silentLogger) {
    this.config = config;
    this.logger = logger;
  }

  validate(face: FaceDescriptor): ValidationResult {
    const { leftEye, rightEye, nose } = face.landmarks;
    const roll = estimateRoll(leftEye, rightEye);
    const yaw = estimateYaw(leftEye, rightEye, nose, face.boundingBox.width);

    if (Math.abs(roll) > this.config.maxRollDegrees + ANGLE_EPSILON) {
      return this.reject("roll", `roll ${roll.toFixed(2)}° > ${this.config.maxRollDegrees}°`);
    }

    if (Math.abs(yaw) > this.config.maxYawDegrees + ANGLE_EPSILON) {
      return this.reject("yaw", `yaw ${yaw.toFixed(2)} > ${this.config.maxYawDegrees}`);
    }

    if (face.brightness === null || !Number.isFinite(face.brightness)) {
      return this.reject("brightness_unavailable", "brightness not measured");
    }

    if (
      face.brightness < this.config.minBrightness ||
      face.brightness > this.config.maxBrightness
    ) {
      return this.reject(
        "brightness",
        `brightness ${face.brightness.toFixed(3)} outside ` +
          `[${this.config.minBrightness}, ${this.config.maxBrightness}]`,
      );
    }

    if (face.captureQuality === null || !Number.isFinite(face.captureQuality)) {
      return this.reject("quality_unavailable", "capture quality not reported");
    }

    if (face.captureQuality < this.config.minCaptureQuality) {
      return this.reject(
        "quality",
        `capture quality ${face.captureQuality.toFixed(3)} < ${this.config.minCaptureQuality}`,
      );
    }

    return { valid: true, quality: face.captureQuality, rollDegrees: roll, yaw };
  }

  private reject(reason: FaceRejection, detail: string): ValidationResult {
    this.logger.debug(`Rejected: ${detail}`);
    return { valid: false, reason, detail };
  }
}
