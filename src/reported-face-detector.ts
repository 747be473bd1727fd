/**
 * ReportedFaceDetector: FaceDetector backed by client-side detection.
 *
 * The capture client runs a face detector next to the camera and attaches the
 * result (box, eye and nose landmarks, capture quality) to each frame header.
 * This detector turns that report into a FaceDescriptor and measures the mean
 * brightness of the face region from the JPEG itself, so lighting is judged on
 * the pixels the server will embed.
 */

import sharp from "sharp";
import type { FaceDescriptor, Frame, ReportedFace } from "./types.js";
import type { FaceDetector } from "./face-analyzer.js";
import { toPixelRect } from "./face-geometry.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

/**
 * Mean luminance of an image region in [0, 1], averaged over the colour channels.
 * Returns null when the image cannot be decoded or the region is empty.
 */
export async function measureRegionBrightness(
  image: Buffer,
  face: ReportedFace,
): Promise<number | null> {
  const decoder = sharp(image);
  const meta = await decoder.metadata();
  if (!meta.width || !meta.height) return null;

  const rect = toPixelRect(face.boundingBox, meta.width, meta.height);
  if (!rect) return null;

  const stats = await decoder.extract(rect).stats();
  const colour = stats.channels.slice(0, 3);
  if (colour.length === 0) return null;

  const mean = colour.reduce((sum, ch) => sum + ch.mean, 0) / colour.length;
  return mean / 255;
}

export class ReportedFaceDetector implements FaceDetector {
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  async detect(frame: Frame): Promise<FaceDescriptor | null> {
    const reported = frame.header.face;
    if (!reported) return null;

    let brightness: number | null;
    try {
      brightness = await measureRegionBrightness(frame.image, reported);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      this.logger.debug(`Brightness measurement failed on frame ${frame.header.seq}: ${errMsg}`);
      brightness = null;
    }

    return {
      boundingBox: reported.boundingBox,
      landmarks: reported.landmarks,
      captureQuality: reported.captureQuality ?? null,
      brightness,
    };
  }
}
