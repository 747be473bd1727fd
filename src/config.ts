// Face Verification Service - Configuration
//
// Reads process environment (populated from .env by dotenv in index.ts) into
// typed config objects. Tuning knobs fall back to defaults when unset or
// malformed; service URLs are required.

import type {
  AppConfig,
  PipelineConfig,
  EmbeddingServiceConfig,
  BackendConfig,
} from "./types.js";
import { isLogLevel, type Logger } from "./logger.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  validation: {
    maxRollDegrees: 15,
    maxYawDegrees: 15,
    minBrightness: 0.25,
    maxBrightness: 0.85,
    minCaptureQuality: 0.2,
  },
  collector: {
    windowMs: 800,
    highWaterMark: 0.9,
  },
  maxAdmissionRate: 0,
  faceInputSize: 112,
};

export const DEFAULT_EMBEDDING_CONFIG: Omit<EmbeddingServiceConfig, "baseUrl"> = {
  modelName: "w600k_r50",
  inputName: "input_1",
  outputName: "683",
  dimension: 512,
  timeoutMs: 5000,
};

export const DEFAULT_BACKEND_TIMEOUT_MS = 10_000;
export const DEFAULT_PORT = 3000;

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Parsing helpers ────────────────────────────────────────────────────────────

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  rule: NumberRule,
  logger: Logger,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  const invalid =
    !Number.isFinite(value) ||
    (rule.integer === true && !Number.isInteger(value)) ||
    (rule.min !== undefined && value < rule.min) ||
    (rule.max !== undefined && value > rule.max);

  if (invalid) {
    logger.warn(`${key}="${raw}" is not valid, using default ${fallback}`);
    return fallback;
  }
  return value;
}

function readRequiredUrl(env: Env, key: string): string {
  const raw = env[key]?.trim();
  if (!raw) {
    throw new ConfigError(`${key} is not set. Add it to your .env file.`);
  }
  try {
    new URL(raw);
  } catch {
    throw new ConfigError(`${key}="${raw}" is not a valid URL.`);
  }
  return raw.replace(/\/+$/, "");
}

// ─── Loaders ────────────────────────────────────────────────────────────────────

export function loadPipelineConfig(env: Env, logger: Logger): PipelineConfig {
  const d = DEFAULT_PIPELINE_CONFIG;
  const unit = { min: 0, max: 1 };
  const degrees = { min: 0, max: 90 };

  const config: PipelineConfig = {
    validation: {
      maxRollDegrees: readNumber(env, "MAX_ROLL_DEGREES", d.validation.maxRollDegrees, degrees, logger),
      maxYawDegrees: readNumber(env, "MAX_YAW_DEGREES", d.validation.maxYawDegrees, degrees, logger),
      minBrightness: readNumber(env, "MIN_BRIGHTNESS", d.validation.minBrightness, unit, logger),
      maxBrightness: readNumber(env, "MAX_BRIGHTNESS", d.validation.maxBrightness, unit, logger),
      minCaptureQuality: readNumber(env, "MIN_CAPTURE_QUALITY", d.validation.minCaptureQuality, unit, logger),
    },
    collector: {
      windowMs: readNumber(env, "COLLECTION_WINDOW_MS", d.collector.windowMs, { min: 1 }, logger),
      highWaterMark: readNumber(env, "HIGH_WATER_MARK", d.collector.highWaterMark, unit, logger),
    },
    maxAdmissionRate: readNumber(env, "MAX_ADMISSION_RATE", d.maxAdmissionRate, { min: 0 }, logger),
    faceInputSize: readNumber(env, "FACE_INPUT_SIZE", d.faceInputSize, { min: 16, max: 1024, integer: true }, logger),
  };

  if (config.validation.minBrightness > config.validation.maxBrightness) {
    logger.warn(
      `MIN_BRIGHTNESS (${config.validation.minBrightness}) exceeds MAX_BRIGHTNESS ` +
        `(${config.validation.maxBrightness}), using default brightness band`,
    );
    config.validation.minBrightness = d.validation.minBrightness;
    config.validation.maxBrightness = d.validation.maxBrightness;
  }

  return config;
}

export function loadBackendConfig(env: Env, logger: Logger): BackendConfig {
  return {
    baseUrl: readRequiredUrl(env, "BACKEND_BASE_URL"),
    timeoutMs: readNumber(env, "BACKEND_TIMEOUT_MS", DEFAULT_BACKEND_TIMEOUT_MS, { min: 1, integer: true }, logger),
    adminKey: env.ADMIN_KEY?.trim() || null,
  };
}

export function loadEmbeddingConfig(env: Env, logger: Logger): EmbeddingServiceConfig {
  const d = DEFAULT_EMBEDDING_CONFIG;
  return {
    baseUrl: readRequiredUrl(env, "EMBEDDING_SERVICE_URL"),
    modelName: env.EMBEDDING_MODEL_NAME?.trim() || d.modelName,
    inputName: env.EMBEDDING_INPUT_NAME?.trim() || d.inputName,
    outputName: env.EMBEDDING_OUTPUT_NAME?.trim() || d.outputName,
    dimension: readNumber(env, "EMBEDDING_DIMENSION", d.dimension, { min: 1, integer: true }, logger),
    timeoutMs: readNumber(env, "EMBEDDING_TIMEOUT_MS", d.timeoutMs, { min: 1, integer: true }, logger),
  };
}

/**
 * Load the full application config.
 * @throws ConfigError when a required value is missing or invalid.
 */
export function loadConfig(env: Env, logger: Logger): AppConfig {
  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase();
  let logLevel: AppConfig["logLevel"] = "info";
  if (rawLevel) {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      logger.warn(`LOG_LEVEL="${env.LOG_LEVEL}" is not valid, using "info"`);
    }
  }

  return {
    port: readNumber(env, "PORT", DEFAULT_PORT, { min: 0, max: 65535, integer: true }, logger),
    logLevel,
    backend: loadBackendConfig(env, logger),
    embedding: loadEmbeddingConfig(env, logger),
    pipeline: loadPipelineConfig(env, logger),
  };
}
