/**
 * Employee registration: a photo with a reported face becomes an embedding,
 * which is stored with the employee record on the backend.
 *
 * The photo goes through the same analyzer (detection + validation) and
 * processor (crop, resize, embed) as live frames, so a registered embedding
 * is comparable with the ones produced during verification.
 */

import sharp from "sharp";
import type {
  EmployeeInput,
  EmployeeRecord,
  FaceEmbedding,
  Frame,
  RegistrationRequest,
  ReportedFace,
} from "./types.js";
import type { FrameAnalyzing } from "./face-analyzer.js";
import type { FaceProcessing } from "./face-processor.js";
import type { HttpClient } from "./http-client.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { VerificationError } from "./errors.js";

export const REGISTER_PATH = "/employees/";
export const ADMIN_KEY_HEADER = "X-Admin-Key";

// ─── Embedding ──────────────────────────────────────────────────────────────────

export interface RegistrationEmbedding {
  embedding(image: Buffer, face: ReportedFace): Promise<FaceEmbedding>;
}

export class RegistrationEmbeddingService implements RegistrationEmbedding {
  private readonly analyzer: FrameAnalyzing;
  private readonly processor: FaceProcessing;

  constructor(analyzer: FrameAnalyzing, processor: FaceProcessing) {
    this.analyzer = analyzer;
    this.processor = processor;
  }

  /**
   * @throws VerificationError IMAGE_LOAD_FAILED when the photo cannot be decoded,
   *   FACE_VALIDATION_FAILED when the face does not pass validation, or a
   *   preprocessing/model code from the processor
   */
  async embedding(image: Buffer, face: ReportedFace): Promise<FaceEmbedding> {
    let width: number | undefined;
    let height: number | undefined;
    try {
      ({ width, height } = await sharp(image).metadata());
    } catch (err) {
      throw new VerificationError("IMAGE_LOAD_FAILED", { cause: err });
    }
    if (!width || !height) {
      throw new VerificationError("IMAGE_LOAD_FAILED", { debugMessage: "image has no dimensions" });
    }

    const frame: Frame = { header: { timestamp: 0, seq: 0, width, height, face }, image };
    const analysis = await this.analyzer.analyze(frame);
    if (!analysis) {
      throw new VerificationError("FACE_VALIDATION_FAILED", {
        debugMessage: `reported face rejected on a ${width}x${height} photo`,
      });
    }

    return this.processor.process(frame, analysis.face);
  }
}

// ─── Backend ────────────────────────────────────────────────────────────────────

export interface EmployeeRegistrationServing {
  addEmployee(input: EmployeeInput): Promise<void>;
}

export class EmployeeRegistrationService implements EmployeeRegistrationServing {
  private readonly http: HttpClient;
  private readonly adminKey: string;

  constructor(http: HttpClient, adminKey: string) {
    this.http = http;
    this.adminKey = adminKey;
  }

  async addEmployee(input: EmployeeInput): Promise<void> {
    await this.http.requestEnvelope("POST", REGISTER_PATH, {
      body: input,
      headers: { [ADMIN_KEY_HEADER]: this.adminKey },
    });
  }
}

// ─── Registrar ──────────────────────────────────────────────────────────────────

export interface Registrar {
  register(request: RegistrationRequest): Promise<EmployeeRecord>;
}

export class EmployeeRegistrar implements Registrar {
  private readonly embedder: RegistrationEmbedding;
  private readonly service: EmployeeRegistrationServing;
  private readonly logger: Logger;

  constructor(
    embedder: RegistrationEmbedding,
    service: EmployeeRegistrationServing,
    logger: Logger = silentLogger,
  ) {
    this.embedder = embedder;
    this.service = service;
    this.logger = logger;
  }

  async register(request: RegistrationRequest): Promise<EmployeeRecord> {
    const { employeeId, name, role } = request;
    const embedding = await this.embedder.embedding(request.image, request.face);
    await this.service.addEmployee({ employeeId, name, role, embedding: embedding.values });
    this.logger.info(`Registered employee ${employeeId}`);
    return { employeeId, name, role };
  }
}
