/**
 * FacePreprocessor: crops the face out of a frame and renders it at model size.
 *
 * Crop rectangle: reported box rounded outward to whole pixels and clipped to
 * the image. Resize: scale-to-fill then centre-crop to a square of
 * `outputSize`, Lanczos kernel. Output: interleaved 8-bit sRGB, no alpha.
 */

import sharp from "sharp";
import type { FaceDescriptor, Frame } from "./types.js";
import { toPixelRect } from "./face-geometry.js";
import { VerificationError } from "./errors.js";

export interface PreprocessedFace {
  /** Interleaved RGB bytes, row-major, `width * height * 3` long. */
  data: Buffer;
  width: number;
  height: number;
}

export interface FacePreprocessing {
  preprocess(frame: Frame, face: FaceDescriptor): Promise<PreprocessedFace>;
}

export class FacePreprocessor implements FacePreprocessing {
  private readonly outputSize: number;

  constructor(outputSize: number = 112) {
    this.outputSize = outputSize;
  }

  /**
   * @throws VerificationError FACE_PREPROCESSING_RESIZE_FAILED when the face
   *   region is empty or at most one pixel on a side
   * @throws VerificationError FACE_PREPROCESSING_RENDER_FAILED when the frame
   *   cannot be decoded or rendered at the target size
   */
  async preprocess(frame: Frame, face: FaceDescriptor): Promise<PreprocessedFace> {
    let width: number | undefined;
    let height: number | undefined;
    try {
      ({ width, height } = await sharp(frame.image).metadata());
    } catch (err) {
      throw new VerificationError("FACE_PREPROCESSING_RENDER_FAILED", {
        debugMessage: `frame ${frame.header.seq} could not be decoded`,
        cause: err,
      });
    }
    if (!width || !height) {
      throw new VerificationError("FACE_PREPROCESSING_RENDER_FAILED", {
        debugMessage: `frame ${frame.header.seq} has no dimensions`,
      });
    }

    const rect = toPixelRect(face.boundingBox, width, height);
    if (!rect || rect.width <= 1 || rect.height <= 1) {
      throw new VerificationError("FACE_PREPROCESSING_RESIZE_FAILED", {
        debugMessage: `face region ${JSON.stringify(face.boundingBox)} is empty in ${width}x${height} frame`,
      });
    }

    const size = this.outputSize;
    let rendered: { data: Buffer; info: sharp.OutputInfo };
    try {
      rendered = await sharp(frame.image)
        .extract(rect)
        .resize(size, size, { fit: "cover", position: "centre", kernel: "lanczos3" })
        .removeAlpha()
        .toColourspace("srgb")
        .raw()
        .toBuffer({ resolveWithObject: true });
    } catch (err) {
      throw new VerificationError("FACE_PREPROCESSING_RENDER_FAILED", {
        debugMessage: `render of ${rect.width}x${rect.height} crop failed`,
        cause: err,
      });
    }

    const { data, info } = rendered;
    if (info.channels !== 3 || data.length !== size * size * 3) {
      throw new VerificationError("FACE_PREPROCESSING_RENDER_FAILED", {
        debugMessage: `rendered ${info.width}x${info.height}x${info.channels}, expected ${size}x${size}x3`,
      });
    }

    return { data, width: info.width, height: info.height };
  }
}
