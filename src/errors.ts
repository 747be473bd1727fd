// Face Verification Service - Typed errors
//
// Every hard failure in the pipeline is a VerificationError carrying a stable
// ErrorCode. The code drives the user-facing message; debugMessage and cause
// are for logs only and never reach the client.

import type { ErrorCode } from "./types.js";

// ─── User Messages ──────────────────────────────────────────────────────────────

const USER_MESSAGES: Readonly<Record<ErrorCode, string>> = {
  CAMERA_START_FAILED: "Failed to start the camera. Please try again.",
  MODEL_OUTPUT_MISSING:
    "The face recognition system had a problem. Please try again.",
  MODEL_FAILED_TO_LOAD:
    "The face recognition system is unavailable. Please try again later.",
  FACE_VALIDATION_FAILED:
    "No usable face was found in the photo. Use a well-lit, front-facing photo.",
  IMAGE_LOAD_FAILED: "The photo could not be read. Please use a JPEG or PNG image.",
  FACE_PREPROCESSING_RESIZE_FAILED:
    "There was a problem processing the face image. Move closer to the camera and try again.",
  FACE_PREPROCESSING_RENDER_FAILED:
    "There was a problem processing the face image. Please try again.",
  EMPLOYEE_ALREADY_EXISTS: "An employee with this ID is already registered.",
  EMPLOYEE_NOT_FOUND: "Employee not found. Please check the details.",
  FACE_CONFIDENCE_TOO_LOW:
    "Face not recognized. Try again with better lighting and angle.",
  NO_EMPLOYEES_FOUND: "No employees are registered in the system.",
  DB_ERROR: "Server error. Please try again later.",
  NETWORK_UNAVAILABLE:
    "No connection to the verification server. Please check the network and try again.",
  REQUEST_TIMED_OUT: "The request took too long. Please try again.",
  BAD_URL: "The service is misconfigured (invalid request URL). Please contact support.",
  INVALID_RESPONSE:
    "Received an invalid response from the server. Please try again later.",
  DECODING_FAILED:
    "The server returned unexpected data. Please try again later.",
  INVALID_MESSAGE: "The request could not be understood.",
  NOT_VERIFIED: "Verify your face before clocking in or out.",
  UNAUTHORIZED: "You are not allowed to do that.",
  REGISTRATION_DISABLED: "Employee registration is not enabled on this server.",
  UNKNOWN: "Something went wrong. Please try again.",
};

/** Friendly, non-technical message for a code. */
export function userMessage(code: ErrorCode): string {
  return USER_MESSAGES[code];
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && Object.hasOwn(USER_MESSAGES, value);
}

/** Map a backend-supplied code string onto ErrorCode. Unrecognized values become UNKNOWN. */
export function errorCodeFromBackend(code: string | null | undefined): ErrorCode {
  return isErrorCode(code) ? code : "UNKNOWN";
}

// ─── Error Classes ──────────────────────────────────────────────────────────────

export class VerificationError extends Error {
  readonly code: ErrorCode;
  readonly debugMessage: string | null;

  constructor(
    code: ErrorCode,
    options?: { debugMessage?: string; cause?: unknown },
  ) {
    super(userMessage(code), { cause: options?.cause });
    this.name = "VerificationError";
    this.code = code;
    this.debugMessage = options?.debugMessage ?? null;
  }

  /** One-line description for logs: code, debug context and cause. */
  describe(): string {
    const parts: string[] = [this.code];
    if (this.debugMessage) parts.push(this.debugMessage);
    if (this.cause !== undefined) {
      parts.push(
        `cause: ${this.cause instanceof Error ? this.cause.message : String(this.cause)}`,
      );
    }
    return parts.join(" — ");
  }
}

/**
 * Thrown when in-flight work is aborted by its owner (stop, disconnect).
 * Never reported to the user.
 */
export class CancelledError extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function isCancellation(err: unknown): boolean {
  return err instanceof CancelledError;
}

/** Normalize anything thrown into a VerificationError. Foreign errors become UNKNOWN. */
export function toVerificationError(err: unknown): VerificationError {
  if (err instanceof VerificationError) return err;
  return new VerificationError("UNKNOWN", {
    debugMessage: err instanceof Error ? err.message : String(err),
    cause: err,
  });
}
