// FaceProcessor: winning frame + face → normalized embedding.
// Preprocessing and inference are delegated; this class only sequences them
// and honours cancellation between the two stages.

import type { FaceDescriptor, FaceEmbedding, Frame } from "./types.js";
import type { FacePreprocessing } from "./face-preprocessor.js";
import type { FaceEmbedder } from "./face-embedder.js";
import { CancelledError } from "./errors.js";

export interface FaceProcessing {
  process(frame: Frame, face: FaceDescriptor, signal?: AbortSignal): Promise<FaceEmbedding>;
}

export class FaceProcessor implements FaceProcessing {
  private readonly preprocessor: FacePreprocessing;
  private readonly embedder: FaceEmbedder;

  constructor(preprocessor: FacePreprocessing, embedder: FaceEmbedder) {
    this.preprocessor = preprocessor;
    this.embedder = embedder;
  }

  /** @throws VerificationError from preprocessing or inference; CancelledError if aborted. */
  async process(
    frame: Frame,
    face: FaceDescriptor,
    signal?: AbortSignal,
  ): Promise<FaceEmbedding> {
    const preprocessed = await this.preprocessor.preprocess(frame, face);
    if (signal?.aborted) throw new CancelledError();
    return this.embedder.embed(preprocessed, signal);
  }
}
