/**
 * FaceEmbedder: runs the embedding model on a preprocessed face.
 *
 * 1. RGB bytes → planar NCHW float32, each channel mapped with (v − 127.5) / 128
 * 2. Model inference through the injected EmbeddingModel
 * 3. Output vector extracted by name and length-checked
 * 4. Wrapped in an L2-normalized FaceEmbedding
 *
 * Any model failure, and any missing or malformed output, is MODEL_OUTPUT_MISSING.
 */

import type { FaceEmbedding } from "./types.js";
import type { PreprocessedFace } from "./face-preprocessor.js";
import { createFaceEmbedding } from "./face-embedding.js";
import { VerificationError, isCancellation } from "./errors.js";

// ─── Model Interface ────────────────────────────────────────────────────────────

export interface ModelTensor {
  name: string;
  shape: readonly number[];
  data: Float32Array;
}

/** Raw model outputs keyed by output name. Values are validated by the caller. */
export type ModelOutputs = ReadonlyMap<string, ArrayLike<unknown>>;

export interface EmbeddingModel {
  infer(input: ModelTensor, signal?: AbortSignal): Promise<ModelOutputs>;
}

export interface FaceEmbedderOptions {
  inputName: string;
  outputName: string;
  /** Expected vector length. */
  dimension: number;
}

// ─── Pixel Conversion ───────────────────────────────────────────────────────────

const PIXEL_MEAN = 127.5;
const PIXEL_SCALE = 128.0;

/**
 * Convert interleaved RGB bytes into a [3, H, W] planar float tensor.
 * @throws VerificationError FACE_PREPROCESSING_RENDER_FAILED if the buffer size does not match.
 */
export function toNCHW(face: PreprocessedFace): Float32Array {
  const { data, width, height } = face;
  const plane = width * height;
  if (plane <= 0 || data.length !== plane * 3) {
    throw new VerificationError("FACE_PREPROCESSING_RENDER_FAILED", {
      debugMessage: `pixel buffer of ${data.length} bytes does not match ${width}x${height} RGB`,
    });
  }

  const out = new Float32Array(plane * 3);
  for (let idx = 0; idx < plane; idx++) {
    const i = idx * 3;
    out[idx] = (data[i] - PIXEL_MEAN) / PIXEL_SCALE; // R
    out[plane + idx] = (data[i + 1] - PIXEL_MEAN) / PIXEL_SCALE; // G
    out[2 * plane + idx] = (data[i + 2] - PIXEL_MEAN) / PIXEL_SCALE; // B
  }
  return out;
}

/** Returns the values as numbers, or null if any element is not a finite number. */
function toFiniteVector(values: ArrayLike<unknown>): number[] | null {
  const out: number[] = [];
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (typeof v !== "number" || !Number.isFinite(v)) return null;
    out.push(v);
  }
  return out;
}

// ─── Embedder ───────────────────────────────────────────────────────────────────

export class FaceEmbedder {
  private readonly model: EmbeddingModel;
  private readonly options: FaceEmbedderOptions;

  constructor(model: EmbeddingModel, options: FaceEmbedderOptions) {
    this.model = model;
    this.options = options;
  }

  async embed(face: PreprocessedFace, signal?: AbortSignal): Promise<FaceEmbedding> {
    const input: ModelTensor = {
      name: this.options.inputName,
      shape: [1, 3, face.height, face.width],
      data: toNCHW(face),
    };

    let outputs: ModelOutputs;
    try {
      outputs = await this.model.infer(input, signal);
    } catch (err) {
      if (isCancellation(err)) throw err;
      throw new VerificationError("MODEL_OUTPUT_MISSING", {
        debugMessage: "model inference failed",
        cause: err,
      });
    }

    const raw = outputs.get(this.options.outputName);
    if (raw === undefined) {
      throw new VerificationError("MODEL_OUTPUT_MISSING", {
        debugMessage: `output "${this.options.outputName}" not present`,
      });
    }

    const vector = toFiniteVector(raw);
    if (vector === null || vector.length !== this.options.dimension) {
      throw new VerificationError("MODEL_OUTPUT_MISSING", {
        debugMessage:
          vector === null
            ? `output "${this.options.outputName}" contains non-numeric values`
            : `output "${this.options.outputName}" has ${vector.length} values, expected ${this.options.dimension}`,
      });
    }

    return createFaceEmbedding(vector);
  }
}
