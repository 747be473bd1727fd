// Face Verification Service - Shared TypeScript interfaces and types
// Runtime code lives in the component modules; this file is types only.

// ─── Geometry ───────────────────────────────────────────────────────────────────

/** A point in frame pixel coordinates (origin top-left). */
export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned box in frame pixel coordinates (origin top-left, may be fractional). */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Integral pixel rectangle, clipped to the decoded image. */
export interface PixelRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

// ─── Frames ─────────────────────────────────────────────────────────────────────

/**
 * Face detection result reported by the capture client alongside a frame.
 * Produced by the browser-side detector; the server validates it.
 */
export interface ReportedFace {
  boundingBox: Rect;
  landmarks: {
    leftEye: Point;
    rightEye: Point;
    nose: Point;
  };
  /** Capture quality in [0, 1] (sharpness + pose), or null when the client could not score it. */
  captureQuality: number | null;
}

export interface FrameHeader {
  timestamp: number; // seconds since capture start (monotonic)
  seq: number; // incrementing frame sequence number
  width: number;
  height: number;
  face?: ReportedFace | null;
}

/** One delivered camera frame. `image` holds the encoded JPEG bytes. */
export interface Frame {
  header: FrameHeader;
  image: Buffer;
}

// ─── Face Analysis ──────────────────────────────────────────────────────────────

/**
 * Opaque face handle passed between pipeline stages.
 * Exposes only what validation and cropping need.
 */
export interface FaceDescriptor {
  boundingBox: Rect;
  landmarks: {
    leftEye: Point;
    rightEye: Point;
    nose: Point;
  };
  captureQuality: number | null;
  /** Mean luminance of the face region in [0, 1], or null if it could not be measured. */
  brightness: number | null;
}

export interface FaceAnalysis {
  face: FaceDescriptor;
  quality: number;
}

export interface FaceCandidate {
  face: FaceDescriptor;
  frame: Frame;
  quality: number;
}

export interface CollectorResult {
  winner: FaceCandidate | null;
  progress: number;
}

// ─── Embeddings ─────────────────────────────────────────────────────────────────

export interface FaceEmbedding {
  /** L2-normalized values (‖values‖₂ ≈ 1) unless the raw vector was all zeros. */
  readonly values: readonly number[];
}

// ─── Error Codes ────────────────────────────────────────────────────────────────

/** Stable error identifiers shared with the backend and the capture client. */
export type ErrorCode =
  // Camera & session
  | "CAMERA_START_FAILED"
  // Model
  | "MODEL_OUTPUT_MISSING"
  | "MODEL_FAILED_TO_LOAD"
  // Face & image
  | "FACE_VALIDATION_FAILED"
  | "IMAGE_LOAD_FAILED"
  // Preprocessing
  | "FACE_PREPROCESSING_RESIZE_FAILED"
  | "FACE_PREPROCESSING_RENDER_FAILED"
  // Backend
  | "EMPLOYEE_ALREADY_EXISTS"
  | "EMPLOYEE_NOT_FOUND"
  | "FACE_CONFIDENCE_TOO_LOW"
  | "NO_EMPLOYEES_FOUND"
  | "DB_ERROR"
  // Network / transport
  | "NETWORK_UNAVAILABLE"
  | "REQUEST_TIMED_OUT"
  | "BAD_URL"
  | "INVALID_RESPONSE"
  | "DECODING_FAILED"
  // Client protocol
  | "INVALID_MESSAGE"
  | "NOT_VERIFIED"
  | "UNAUTHORIZED"
  | "REGISTRATION_DISABLED"
  // Misc
  | "UNKNOWN";

// ─── Verification State Machine ─────────────────────────────────────────────────

export type VerificationState =
  | { status: "detecting" }
  | { status: "processing" }
  | { status: "matched"; name: string }
  | { status: "timed_out" }
  | { status: "error"; code: ErrorCode };

export interface VerificationMatch {
  employeeId: string;
  name: string;
}

// ─── Backend Models ─────────────────────────────────────────────────────────────

export interface EmployeeRecord {
  employeeId: string;
  name: string;
  role: string;
}

/** Registration payload sent to the backend. `embedding` is L2-normalized. */
export interface EmployeeInput {
  employeeId: string;
  name: string;
  role: string;
  embedding: readonly number[];
}

/** Registration as submitted by an admin client: a photo plus the face found in it. */
export interface RegistrationRequest {
  employeeId: string;
  name: string;
  role: string;
  image: Buffer;
  face: ReportedFace;
}

export interface ClockStatus {
  isClockedIn: boolean;
  clockInTime: string | null; // ISO-8601
}

/** Standard response envelope returned by the backend. */
export interface ApiEnvelope<T> {
  success: boolean;
  data: T | null;
  code: string | null;
  message: string | null;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface ValidationConfig {
  maxRollDegrees: number;
  maxYawDegrees: number;
  minBrightness: number;
  maxBrightness: number;
  minCaptureQuality: number;
}

export interface CollectorConfig {
  /** Collection window length in milliseconds. */
  windowMs: number;
  /** Quality at or above which a candidate wins immediately. */
  highWaterMark: number;
}

export interface PipelineConfig {
  validation: ValidationConfig;
  collector: CollectorConfig;
  /** Frames per second admitted through the gate. 0 disables throttling. */
  maxAdmissionRate: number;
  /** Side length of the square model input. */
  faceInputSize: number;
}

export interface EmbeddingServiceConfig {
  baseUrl: string;
  modelName: string;
  inputName: string;
  outputName: string;
  dimension: number;
  timeoutMs: number;
}

export interface BackendConfig {
  baseUrl: string;
  timeoutMs: number;
  /** Sent as X-Admin-Key on registration. Registration is disabled when null. */
  adminKey: string | null;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  backend: BackendConfig;
  embedding: EmbeddingServiceConfig;
  pipeline: PipelineConfig;
}

// ─── Utility ────────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Client → Server messages (binary frames carry video; these are JSON)
export type ClientMessage =
  | { type: "start_verification"; employeeId: string }
  | { type: "stop_verification" }
  | { type: "clock_in" }
  | { type: "clock_out" };

// Server → Client messages
export type ServerMessage =
  | { type: "state_change"; state: VerificationState; progress: number }
  | { type: "error"; code: ErrorCode; message: string }
  | { type: "clock_status"; isClockedIn: boolean; clockInTime: string | null };
