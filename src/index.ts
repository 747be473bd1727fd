// Face Verification Service - Entry point
// Wires up all pipeline dependencies and starts the server.

import "dotenv/config";
import { createAppServer } from "./server.js";
import { ConfigError, loadConfig } from "./config.js";
import { createConsoleLogger, setLogLevel } from "./logger.js";
import { HttpClient } from "./http-client.js";
import { KServeEmbeddingModel } from "./kserve-embedding-model.js";
import { FacePreprocessor } from "./face-preprocessor.js";
import { FaceEmbedder } from "./face-embedder.js";
import { FaceProcessor } from "./face-processor.js";
import { ReportedFaceDetector } from "./reported-face-detector.js";
import { VerificationClient } from "./verification-client.js";
import { EmployeeService } from "./employee-service.js";
import { createOrchestratorFactory } from "./pipeline.js";
import { FaceAnalyzer } from "./face-analyzer.js";
import { FaceValidator } from "./face-validator.js";
import {
  EmployeeRegistrar,
  EmployeeRegistrationService,
  RegistrationEmbeddingService,
} from "./employee-registration.js";
import { VerificationError } from "./errors.js";
import type { AppConfig } from "./types.js";

export const APP_NAME = "Face Verification Service";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig(process.env, createConsoleLogger("Config"));
} catch (err) {
  if (err instanceof ConfigError) {
    logFatal(err.message);
    process.exit(1);
  }
  throw err;
}

setLogLevel(config.logLevel);
logInit(`Configuration loaded (log level ${config.logLevel})`);

// ─── Initialize HTTP clients ────────────────────────────────────────────────────

logInit(`Creating backend client for ${config.backend.baseUrl}...`);
const backendHttp = new HttpClient({
  baseUrl: config.backend.baseUrl,
  timeoutMs: config.backend.timeoutMs,
  logger: createConsoleLogger("Backend"),
});

logInit(`Creating embedding model client for ${config.embedding.baseUrl}...`);
const embeddingHttp = new HttpClient({
  baseUrl: config.embedding.baseUrl,
  timeoutMs: config.embedding.timeoutMs,
  logger: createConsoleLogger("EmbeddingService"),
});
const model = new KServeEmbeddingModel(
  embeddingHttp,
  config.embedding,
  createConsoleLogger("EmbeddingModel"),
);

// ─── Start ──────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  logInit(`Checking embedding model ${config.embedding.modelName}...`);
  await model.ensureReady();

  logInit(`Initializing FaceProcessor (${config.pipeline.faceInputSize}px input)...`);
  const processor = new FaceProcessor(
    new FacePreprocessor(config.pipeline.faceInputSize),
    new FaceEmbedder(model, {
      inputName: config.embedding.inputName,
      outputName: config.embedding.outputName,
      dimension: config.embedding.dimension,
    }),
  );

  logInit("Wiring verification pipeline...");
  const detector = new ReportedFaceDetector(createConsoleLogger("FaceDetector"));

  const { adminKey } = config.backend;
  let registration: { registrar: EmployeeRegistrar; adminKey: string } | null = null;
  if (adminKey) {
    const analyzer = new FaceAnalyzer(
      detector,
      new FaceValidator(config.pipeline.validation, createConsoleLogger("RegistrationValidator")),
      createConsoleLogger("RegistrationAnalyzer"),
    );
    registration = {
      registrar: new EmployeeRegistrar(
        new RegistrationEmbeddingService(analyzer, processor),
        new EmployeeRegistrationService(backendHttp, adminKey),
        createConsoleLogger("Registration"),
      ),
      adminKey,
    };
    logInit("Employee registration enabled");
  } else {
    logInit("ADMIN_KEY not set, employee registration disabled");
  }

  const server = createAppServer({
    createOrchestrator: createOrchestratorFactory({
      config: config.pipeline,
      detector,
      processor,
      verifier: new VerificationClient(backendHttp),
    }),
    employees: new EmployeeService(backendHttp),
    registration,
    logger: createConsoleLogger("Server"),
  });

  await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  logInit("Pipeline: FaceAnalyzer → FrameCollector → FaceProcessor → VerificationClient");
  logInit("Ready for connections");
}

main().catch((err: unknown) => {
  logFatal(err instanceof VerificationError ? err.describe() : String(err));
  process.exit(1);
});
