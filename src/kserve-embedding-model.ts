/**
 * Embedding model reached over the KServe v2 inference protocol.
 *
 *   GET  /v2/models/{name}        model metadata (startup check)
 *   POST /v2/models/{name}/infer  inference
 *
 * Works against any v2-compatible server (Triton, KServe, MLServer) hosting the
 * face recognition network.
 */

import type { EmbeddingServiceConfig } from "./types.js";
import type { EmbeddingModel, ModelOutputs, ModelTensor } from "./face-embedder.js";
import type { HttpClient } from "./http-client.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { VerificationError, isCancellation } from "./errors.js";

interface TensorMetadata {
  name: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tensorNames(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((t): t is TensorMetadata => isObject(t) && typeof t.name === "string")
    .map((t) => t.name);
}

function describeFailure(body: unknown): string {
  return isObject(body) && typeof body.error === "string" ? body.error : "no error detail";
}

export class KServeEmbeddingModel implements EmbeddingModel {
  private readonly http: HttpClient;
  private readonly config: EmbeddingServiceConfig;
  private readonly logger: Logger;

  constructor(http: HttpClient, config: EmbeddingServiceConfig, logger: Logger = silentLogger) {
    this.http = http;
    this.config = config;
    this.logger = logger;
  }

  private get modelPath(): string {
    return `/v2/models/${encodeURIComponent(this.config.modelName)}`;
  }

  /**
   * Confirm the model is served and exposes the configured input and output tensors.
   * @throws VerificationError MODEL_FAILED_TO_LOAD otherwise
   */
  async ensureReady(): Promise<void> {
    let status: number;
    let body: unknown;
    try {
      ({ status, body } = await this.http.requestJson("GET", this.modelPath, { convertKeys: false }));
    } catch (err) {
      throw new VerificationError("MODEL_FAILED_TO_LOAD", {
        debugMessage: `metadata request for ${this.config.modelName} failed`,
        cause: err,
      });
    }

    if (status !== 200 || !isObject(body)) {
      throw new VerificationError("MODEL_FAILED_TO_LOAD", {
        debugMessage: `model ${this.config.modelName} not available (HTTP ${status}: ${describeFailure(body)})`,
      });
    }

    const inputs = tensorNames(body.inputs);
    const outputs = tensorNames(body.outputs);
    if (!inputs.includes(this.config.inputName) || !outputs.includes(this.config.outputName)) {
      throw new VerificationError("MODEL_FAILED_TO_LOAD", {
        debugMessage:
          `model ${this.config.modelName} exposes inputs [${inputs.join(", ")}] and outputs ` +
          `[${outputs.join(", ")}], expected ${this.config.inputName} → ${this.config.outputName}`,
      });
    }

    this.logger.info(`Model ${this.config.modelName} ready`);
  }

  async infer(input: ModelTensor, signal?: AbortSignal): Promise<ModelOutputs> {
    const request = {
      inputs: [
        {
          name: input.name,
          shape: input.shape,
          datatype: "FP32",
          data: Array.from(input.data),
        },
      ],
      outputs: [{ name: this.config.outputName }],
    };

    let status: number;
    let body: unknown;
    try {
      ({ status, body } = await this.http.requestJson("POST", `${this.modelPath}/infer`, {
        body: request,
        signal,
        convertKeys: false,
      }));
    } catch (err) {
      if (!isCancellation(err)) {
        this.logger.warn(`Inference request failed: ${err instanceof Error ? err.message : String(err)}`);
      }
      throw err;
    }

    if (status !== 200) {
      throw new VerificationError("INVALID_RESPONSE", {
        debugMessage: `inference returned HTTP ${status}: ${describeFailure(body)}`,
      });
    }

    const outputs = new Map<string, ArrayLike<unknown>>();
    if (isObject(body) && Array.isArray(body.outputs)) {
      for (const tensor of body.outputs) {
        if (isObject(tensor) && typeof tensor.name === "string" && Array.isArray(tensor.data)) {
          outputs.set(tensor.name, tensor.data);
        }
      }
    }
    return outputs;
  }
}
