// Face Verification Service - WebSocket Handler and Express Server
//
// Each WebSocket connection owns one VerificationOrchestrator fed by a
// PushFrameSource. Binary messages carry FV-prefixed video frames; text
// messages carry JSON control messages. Over HTTP: health, employee search
// and admin-only employee registration.
//
// Privacy: frames and embeddings are in-memory only, never written to disk.

import express, { type Express, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { timingSafeEqual } from "node:crypto";
import { WebSocketServer, WebSocket } from "ws";
import { v4 as uuidv4 } from "uuid";
import type {
  ClientMessage,
  ClockStatus,
  ErrorCode,
  RegistrationRequest,
  ServerMessage,
  VerificationState,
} from "./types.js";
import type { EmployeeDirectory } from "./employee-service.js";
import { ADMIN_KEY_HEADER, type Registrar } from "./employee-registration.js";
import { LoggingErrorReporter, type ErrorReporter } from "./error-reporter.js";
import type { VerificationOrchestrator } from "./verification-orchestrator.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { PushFrameSource } from "./frame-source.js";
import { MAX_VIDEO_PAYLOAD_BYTES, decodeVideoFrame, isValidReportedFace } from "./video-frame-codec.js";
import { VerificationError, toVerificationError, userMessage } from "./errors.js";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  connectionId: string;
  source: PushFrameSource;
  orchestrator: VerificationOrchestrator;
  framesReceived: number;
  decodeFailures: number;
  /** Set while a clock in/out request is outstanding. */
  clockInFlight: boolean;
  /** Bumped by each clock in/out; a status read started before it is stale. */
  clockEpoch: number;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

/** Everything a per-connection orchestrator needs from the connection. */
export interface ConnectionIO {
  connectionId: string;
  source: PushFrameSource;
  reporter: ErrorReporter;
  onStateChange: (state: VerificationState, progress: number) => void;
}

export type OrchestratorFactory = (io: ConnectionIO) => VerificationOrchestrator;

export interface CreateServerOptions {
  createOrchestrator: OrchestratorFactory;
  employees: EmployeeDirectory;
  /** Enables POST /api/employees for callers presenting the admin key. */
  registration?: { registrar: Registrar; adminKey: string } | null;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    createOrchestrator,
    employees,
    registration = null,
    logger = createConsoleLogger("Server"),
  } = options;

  const app = express();
  const httpServer = createServer(app);

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Employee lookup, proxied to the backend
  app.get("/api/employees/search", (req, res) => {
    const q = typeof req.query.q === "string" ? req.query.q.trim() : "";
    if (q.length === 0) {
      sendHttpError(res, new VerificationError("INVALID_MESSAGE", { debugMessage: "missing q" }));
      return;
    }
    employees
      .search(q)
      .then((results) => {
        res.json({ employees: results });
      })
      .catch((err: unknown) => {
        const error = toVerificationError(err);
        logger.error(`Employee search failed: ${error.describe()}`);
        sendHttpError(res, error);
      });
  });

  // Employee registration from a photo, admin only
  app.post("/api/employees", express.json({ limit: "4mb" }), (req, res) => {
    if (!registration) {
      sendHttpError(res, new VerificationError("REGISTRATION_DISABLED"));
      return;
    }
    if (!adminKeyMatches(req.get(ADMIN_KEY_HEADER), registration.adminKey)) {
      sendHttpError(res, new VerificationError("UNAUTHORIZED"));
      return;
    }
    const request = parseRegistrationRequest(req.body);
    if (!request) {
      sendHttpError(res, new VerificationError("INVALID_MESSAGE", { debugMessage: "bad registration body" }));
      return;
    }
    registration.registrar
      .register(request)
      .then((employee) => {
        res.status(201).json({ employee });
      })
      .catch((err: unknown) => {
        const error = toVerificationError(err);
        logger.error(`Registration of ${request.employeeId} failed: ${error.describe()}`);
        sendHttpError(res, error);
      });
  });

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, createOrchestrator, employees, logger);
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        // Close all WebSocket connections
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── HTTP Errors ────────────────────────────────────────────────────────────────

export function httpStatusFor(code: ErrorCode): number {
  switch (code) {
    case "INVALID_MESSAGE":
      return 400;
    case "UNAUTHORIZED":
      return 401;
    case "EMPLOYEE_NOT_FOUND":
    case "NO_EMPLOYEES_FOUND":
      return 404;
    case "EMPLOYEE_ALREADY_EXISTS":
      return 409;
    case "FACE_VALIDATION_FAILED":
    case "IMAGE_LOAD_FAILED":
    case "FACE_PREPROCESSING_RESIZE_FAILED":
    case "FACE_PREPROCESSING_RENDER_FAILED":
      return 422;
    case "REGISTRATION_DISABLED":
      return 503;
    case "REQUEST_TIMED_OUT":
      return 504;
    default:
      return 502;
  }
}

function sendHttpError(res: Response, error: VerificationError): void {
  res.status(httpStatusFor(error.code)).json({ code: error.code, message: error.message });
}

function adminKeyMatches(presented: string | undefined, expected: string): boolean {
  if (presented === undefined) return false;
  const a = Buffer.from(presented, "utf-8");
  const b = Buffer.from(expected, "utf-8");
  return a.length === b.length && timingSafeEqual(a, b);
}

// ─── Registration Body ──────────────────────────────────────────────────────────

function nonEmptyString(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Validate a registration body: `{ employeeId, name, role?, image, face }`
 * with `image` as base64 JPEG/PNG and `face` in the frame-header face format.
 */
export function parseRegistrationRequest(body: unknown): RegistrationRequest | null {
  if (!isObject(body)) return null;

  const employeeId = nonEmptyString(body.employeeId);
  const name = nonEmptyString(body.name);
  if (!employeeId || !name) return null;
  if (body.role !== undefined && typeof body.role !== "string") return null;
  const { image: encoded, face } = body;
  if (typeof encoded !== "string" || !isValidReportedFace(face)) return null;

  const image = Buffer.from(encoded, "base64");
  if (image.length === 0 || image.length > MAX_VIDEO_PAYLOAD_BYTES) return null;

  return {
    employeeId,
    name,
    role: typeof body.role === "string" ? body.role.trim() : "",
    image,
    face,
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  createOrchestrator: OrchestratorFactory,
  employees: EmployeeDirectory,
  logger: Logger,
): void {
  const connectionId = uuidv4();
  const source = new PushFrameSource();

  const logged = new LoggingErrorReporter(logger, `Verification failed for connection ${connectionId}`);
  const reporter: ErrorReporter = {
    report(error) {
      logged.report(error);
      sendMessage(ws, { type: "error", code: error.code, message: error.message });
    },
  };

  const orchestrator = createOrchestrator({
    connectionId,
    source,
    reporter,
    onStateChange: (state, progress) => {
      sendMessage(ws, { type: "state_change", state, progress });
      if (state.status === "matched") sendClockStatusAfterMatch(ws, connState, employees, logger);
    },
  });

  const connState: ConnectionState = {
    connectionId,
    source,
    orchestrator,
    framesReceived: 0,
    decodeFailures: 0,
    clockInFlight: false,
    clockEpoch: 0,
  };

  logger.info(`New WebSocket connection ${connectionId}`);

  // Send initial state
  sendMessage(ws, {
    type: "state_change",
    state: orchestrator.state,
    progress: orchestrator.progress,
  });

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    const buf = toBuffer(data);
    if (isBinary) {
      handleBinaryMessage(buf, connState, logger);
      return;
    }
    const message = parseClientMessage(buf.toString("utf-8"));
    if (!message) {
      sendError(ws, "INVALID_MESSAGE");
      return;
    }
    handleClientMessage(ws, message, connState, employees, logger);
  });

  ws.on("close", () => {
    const stats = orchestrator.getStats();
    logger.info(
      `WebSocket closed ${connectionId} (${connState.framesReceived} frames, ${connState.decodeFailures} undecodable, ` +
        `${stats.admitted} admitted, ${stats.droppedBusy} dropped busy, ${stats.droppedThrottled} throttled)`,
    );
    cleanupConnection(connState, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for connection ${connectionId}: ${err.message}`);
    cleanupConnection(connState, logger);
  });
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Binary Message Handler (Video Frames) ──────────────────────────────────────

function handleBinaryMessage(data: Buffer, connState: ConnectionState, logger: Logger): void {
  connState.framesReceived++;
  const frame = decodeVideoFrame(data);
  if (!frame) {
    connState.decodeFailures++;
    if (connState.decodeFailures === 1) {
      logger.warn(`Undecodable video frame on connection ${connState.connectionId}`);
    }
    return;
  }
  // Frames before start_verification or after stop are discarded by the source
  connState.source.push(frame);
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse and validate a JSON control message. Returns null if malformed. */
export function parseClientMessage(text: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isObject(parsed)) return null;

  switch (parsed.type) {
    case "start_verification":
      return typeof parsed.employeeId === "string"
        ? { type: "start_verification", employeeId: parsed.employeeId }
        : null;
    case "stop_verification":
      return { type: "stop_verification" };
    case "clock_in":
      return { type: "clock_in" };
    case "clock_out":
      return { type: "clock_out" };
    default:
      return null;
  }
}

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  employees: EmployeeDirectory,
  logger: Logger,
): void {
  const { orchestrator } = connState;
  const catchAsync = (promise: Promise<void>) => catchAsyncError(ws, connState, logger, promise);

  switch (message.type) {
    case "start_verification":
      catchAsync(handleStartVerification(orchestrator, message.employeeId, logger));
      break;

    case "stop_verification":
      catchAsync(orchestrator.stop());
      break;

    case "clock_in":
    case "clock_out": {
      const match = orchestrator.match;
      if (!match) {
        sendError(ws, "NOT_VERIFIED");
        break;
      }
      if (connState.clockInFlight) {
        logger.debug(`Dropping ${message.type} for ${connState.connectionId}: clock request in flight`);
        break;
      }
      connState.clockInFlight = true;
      connState.clockEpoch++;
      const action: Promise<ClockStatus> =
        message.type === "clock_in"
          ? employees.clockIn(match.employeeId)
          : employees.clockOut(match.employeeId);
      catchAsync(
        action
          .then((status) => {
            logger.info(`${message.type} for employee ${match.employeeId}: clocked ${status.isClockedIn ? "in" : "out"}`);
            sendMessage(ws, { type: "clock_status", ...status });
          })
          .finally(() => {
            connState.clockInFlight = false;
          }),
      );
      break;
    }

    default: {
      const exhaustiveCheck: never = message;
      logger.warn(`Unhandled message ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

/** Tell a freshly matched employee whether they are clocked in. */
function sendClockStatusAfterMatch(
  ws: WebSocket,
  connState: ConnectionState,
  employees: EmployeeDirectory,
  logger: Logger,
): void {
  const match = connState.orchestrator.match;
  if (!match) return;
  const epoch = connState.clockEpoch;
  catchAsyncError(
    ws,
    connState,
    logger,
    employees.getStatus(match.employeeId).then((status) => {
      // A clock action or a new session since the read makes it stale
      if (connState.clockEpoch !== epoch || connState.orchestrator.match !== match) return;
      sendMessage(ws, { type: "clock_status", ...status });
    }),
  );
}

/** Log a failed async handler and send its error to the client. */
function catchAsyncError(
  ws: WebSocket,
  connState: ConnectionState,
  logger: Logger,
  promise: Promise<void>,
): void {
  promise.catch((err: unknown) => {
    const error = toVerificationError(err);
    logger.error(`Async error for connection ${connState.connectionId}: ${error.describe()}`);
    sendMessage(ws, { type: "error", code: error.code, message: error.message });
  });
}

async function handleStartVerification(
  orchestrator: VerificationOrchestrator,
  employeeId: string,
  logger: Logger,
): Promise<void> {
  // Restart from a clean window; this also clears a previous match
  await orchestrator.stop();
  orchestrator.setTargetEmployee(employeeId);
  if (orchestrator.employeeId === null) {
    logger.warn("start_verification without an employee id");
  }
  await orchestrator.start();
}

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function sendError(ws: WebSocket, code: ErrorCode): void {
  sendMessage(ws, { type: "error", code, message: userMessage(code) });
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(connState: ConnectionState, logger: Logger): void {
  connState.orchestrator.stop().catch((err: unknown) => {
    logger.error(
      `Failed to stop orchestrator for ${connState.connectionId}: ${err instanceof Error ? err.message : String(err)}`,
    );
  });
}
