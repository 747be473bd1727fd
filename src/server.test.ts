// Face Verification Service - Server Unit Tests
// HTTP routes and the WebSocket protocol, against a real pipeline with a
// fake embedding step, fake verifier and fake employee directory.

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import WebSocket from "ws";
import {
  createAppServer,
  httpStatusFor,
  parseClientMessage,
  parseRegistrationRequest,
  type AppServer,
} from "./server.js";
import { createOrchestratorFactory } from "./pipeline.js";
import { DEFAULT_PIPELINE_CONFIG } from "./config.js";
import { ReportedFaceDetector } from "./reported-face-detector.js";
import { createFaceEmbedding } from "./face-embedding.js";
import { VerificationError } from "./errors.js";
import { encodeVideoFrame } from "./video-frame-codec.js";
import { makeHeader, makeReportedFace, solidJpeg } from "./face-test-fixtures.js";
import { createDeferred } from "./utils/deferred.js";
import type { EmployeeDirectory } from "./employee-service.js";
import type { VerificationOrchestrator } from "./verification-orchestrator.js";
import type {
  ClockStatus,
  EmployeeRecord,
  FaceEmbedding,
  RegistrationRequest,
  VerificationMatch,
} from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TEST_PORT = 0; // Let OS assign a random port

/** Silent logger for tests */
function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

function typeOf(message: unknown): unknown {
  return typeof message === "object" && message !== null && "type" in message
    ? message.type
    : undefined;
}

/**
 * A test WebSocket client that queues all incoming messages.
 * Messages are buffered so none are lost to race conditions.
 */
class TestClient {
  ws: WebSocket;
  private messageQueue: unknown[] = [];
  private waiters: Array<(msg: unknown) => void> = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", (data: WebSocket.RawData) => {
      const text = Buffer.isBuffer(data) ? data.toString("utf-8") : String(data);
      const msg: unknown = JSON.parse(text);
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(msg);
      } else {
        this.messageQueue.push(msg);
      }
    });
  }

  /** Wait for the WebSocket to open */
  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.on("open", () => resolve());
      this.ws.on("error", reject);
    });
  }

  /** Get the next message (from queue or wait for one) */
  nextMessage(timeoutMs = 3000): Promise<unknown> {
    if (this.messageQueue.length > 0) {
      return Promise.resolve(this.messageQueue.shift());
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiterFn);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error(`nextMessage timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      const waiterFn = (msg: unknown) => {
        clearTimeout(timer);
        resolve(msg);
      };
      this.waiters.push(waiterFn);
    });
  }

  /** Get the next message of a type, skipping others */
  async nextMessageOfType(type: string, timeoutMs = 3000): Promise<unknown> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new Error(`nextMessageOfType("${type}") timed out after ${timeoutMs}ms`);
      }
      const msg = await this.nextMessage(remaining);
      if (typeOf(msg) === type) return msg;
    }
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  sendText(text: string): void {
    this.ws.send(text);
  }

  sendBinary(data: Buffer): void {
    this.ws.send(data);
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

function getPort(server: AppServer): number {
  const addr = server.httpServer.address();
  if (typeof addr === "string" || addr === null) {
    throw new Error("Unexpected server address format");
  }
  return addr.port;
}

const CLOCKED_IN: ClockStatus = { isClockedIn: true, clockInTime: "2026-01-05T08:00:00Z" };
const CLOCKED_OUT: ClockStatus = { isClockedIn: false, clockInTime: null };
const ADA: EmployeeRecord = { employeeId: "E001", name: "Ada Lovelace", role: "Engineer" };

interface FakeDirectory extends EmployeeDirectory {
  search: Mock<[string, AbortSignal?], Promise<EmployeeRecord[]>>;
  clockIn: Mock<[string], Promise<ClockStatus>>;
  clockOut: Mock<[string], Promise<ClockStatus>>;
  getStatus: Mock<[string], Promise<ClockStatus>>;
}

function createFakeDirectory(): FakeDirectory {
  return {
    search: vi.fn<[string, AbortSignal?], Promise<EmployeeRecord[]>>(async () => [ADA]),
    clockIn: vi.fn<[string], Promise<ClockStatus>>(async () => CLOCKED_IN),
    clockOut: vi.fn<[string], Promise<ClockStatus>>(async () => CLOCKED_OUT),
    getStatus: vi.fn<[string], Promise<ClockStatus>>(async () => CLOCKED_OUT),
  };
}

const ADMIN_KEY = "test-admin-key";
const PHOTO = Buffer.from([0xff, 0xd8, 0xff, 0xd9]);

function registrationBody(overrides?: Record<string, unknown>): Record<string, unknown> {
  return {
    employeeId: " E9 ",
    name: "Ann Lee",
    role: "Welder",
    image: PHOTO.toString("base64"),
    face: makeReportedFace(),
    ...overrides,
  };
}

/** Encoded frame of a mid-grey image with a frontal face reported at the given quality. */
async function makeFaceFrame(seq: number, captureQuality = 0.95): Promise<Buffer> {
  const jpeg = await solidJpeg({ r: 128, g: 128, b: 128 });
  return encodeVideoFrame(
    makeHeader({ seq, timestamp: seq / 30, face: makeReportedFace({ captureQuality }) }),
    jpeg,
  );
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("Server", () => {
  let server: AppServer;
  let logger: ReturnType<typeof createSilentLogger>;
  let employees: FakeDirectory;
  let verify: Mock<[string, FaceEmbedding, AbortSignal?], Promise<VerificationMatch>>;
  let register: Mock<[RegistrationRequest], Promise<EmployeeRecord>>;
  let orchestrators: VerificationOrchestrator[];
  let clients: TestClient[];

  beforeEach(async () => {
    logger = createSilentLogger();
    employees = createFakeDirectory();
    verify = vi.fn<[string, FaceEmbedding, AbortSignal?], Promise<VerificationMatch>>(
      async (employeeId) => ({ employeeId, name: "Ada Lovelace" }),
    );
    register = vi.fn<[RegistrationRequest], Promise<EmployeeRecord>>(
      async ({ employeeId, name, role }) => ({ employeeId, name, role }),
    );
    orchestrators = [];
    clients = [];

    const factory = createOrchestratorFactory({
      config: DEFAULT_PIPELINE_CONFIG,
      detector: new ReportedFaceDetector(),
      processor: { process: async () => createFaceEmbedding([1, 0, 0]) },
      verifier: { verify },
    });

    server = createAppServer({
      createOrchestrator: (io) => {
        const orchestrator = factory(io);
        orchestrators.push(orchestrator);
        return orchestrator;
      },
      employees,
      registration: { registrar: { register }, adminKey: ADMIN_KEY },
      logger,
    });
    await server.listen(TEST_PORT);
  });

  afterEach(async () => {
    for (const c of clients) c.close();
    await server.close();
  });

  /** Creates a connected TestClient and consumes the initial state_change message */
  async function connect(): Promise<TestClient> {
    const client = new TestClient(`ws://127.0.0.1:${getPort(server)}`);
    clients.push(client);
    await client.waitForOpen();
    const initial = await client.nextMessage();
    expect(initial).toEqual({ type: "state_change", state: { status: "detecting" }, progress: 0 });
    return client;
  }

  async function startVerification(client: TestClient, employeeId: string): Promise<void> {
    client.sendJson({ type: "start_verification", employeeId });
    await vi.waitFor(() => expect(orchestrators.at(-1)?.isRunning).toBe(true));
  }

  function httpGet(path: string): Promise<Response> {
    return fetch(`http://127.0.0.1:${getPort(server)}${path}`);
  }

  function postEmployee(
    body: unknown,
    adminKey: string | null = ADMIN_KEY,
    target: AppServer = server,
  ): Promise<Response> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (adminKey !== null) headers["X-Admin-Key"] = adminKey;
    return fetch(`http://127.0.0.1:${getPort(target)}/api/employees`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
    });
  }

  /** Drive a connection to a match for E001 and consume the messages it produces. */
  async function matchAda(client: TestClient): Promise<void> {
    await startVerification(client, "E001");
    client.sendBinary(await makeFaceFrame(1));
    await client.nextMessageOfType("state_change");
    await client.nextMessageOfType("state_change");
    expect(await client.nextMessage()).toEqual({ type: "clock_status", ...CLOCKED_OUT });
  }

  // ─── HTTP ─────────────────────────────────────────────────────────────────────

  describe("GET /health", () => {
    it("reports ok", async () => {
      const res = await httpGet("/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok" });
    });
  });

  describe("GET /api/employees/search", () => {
    it("returns matching employees", async () => {
      const res = await httpGet("/api/employees/search?q=%20ada%20");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ employees: [ADA] });
      expect(employees.search).toHaveBeenCalledWith("ada");
    });

    it("rejects an empty query", async () => {
      const res = await httpGet("/api/employees/search?q=");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        code: "INVALID_MESSAGE",
        message: "The request could not be understood.",
      });
      expect(employees.search).not.toHaveBeenCalled();
    });

    it("maps backend failures to HTTP statuses", async () => {
      employees.search.mockRejectedValueOnce(new VerificationError("NO_EMPLOYEES_FOUND"));
      const res = await httpGet("/api/employees/search?q=zed");
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        code: "NO_EMPLOYEES_FOUND",
        message: "No employees are registered in the system.",
      });
      expect(logger.error).toHaveBeenCalledWith("Employee search failed: NO_EMPLOYEES_FOUND");
    });
  });

  describe("POST /api/employees", () => {
    it("registers an employee from a photo", async () => {
      const res = await postEmployee(registrationBody());
      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        employee: { employeeId: "E9", name: "Ann Lee", role: "Welder" },
      });
      expect(register).toHaveBeenCalledTimes(1);
      expect(register.mock.calls[0][0]).toEqual({
        employeeId: "E9",
        name: "Ann Lee",
        role: "Welder",
        image: PHOTO,
        face: makeReportedFace(),
      });
    });

    it("rejects a missing or wrong admin key", async () => {
      const unauthorized = {
        code: "UNAUTHORIZED",
        message: "You are not allowed to do that.",
      };
      const missing = await postEmployee(registrationBody(), null);
      expect(missing.status).toBe(401);
      expect(await missing.json()).toEqual(unauthorized);

      const wrong = await postEmployee(registrationBody(), "test-wrong-key");
      expect(wrong.status).toBe(401);
      expect(await wrong.json()).toEqual(unauthorized);
      expect(register).not.toHaveBeenCalled();
    });

    it("rejects a body without a usable face", async () => {
      const res = await postEmployee(registrationBody({ face: { boundingBox: null } }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        code: "INVALID_MESSAGE",
        message: "The request could not be understood.",
      });
      expect(register).not.toHaveBeenCalled();
    });

    it("maps a duplicate employee to 409", async () => {
      register.mockRejectedValueOnce(new VerificationError("EMPLOYEE_ALREADY_EXISTS"));
      const res = await postEmployee(registrationBody());
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        code: "EMPLOYEE_ALREADY_EXISTS",
        message: "An employee with this ID is already registered.",
      });
      expect(logger.error).toHaveBeenCalledWith("Registration of E9 failed: EMPLOYEE_ALREADY_EXISTS");
    });

    it("is unavailable when no admin key is configured", async () => {
      const closed = createAppServer({
        createOrchestrator: () => {
          throw new Error("no connections expected");
        },
        employees,
        logger,
      });
      await closed.listen(TEST_PORT);
      try {
        const res = await postEmployee(registrationBody(), ADMIN_KEY, closed);
        expect(res.status).toBe(503);
        expect(await res.json()).toEqual({
          code: "REGISTRATION_DISABLED",
          message: "Employee registration is not enabled on this server.",
        });
      } finally {
        await closed.close();
      }
    });
  });

  // ─── WebSocket ────────────────────────────────────────────────────────────────

  describe("WebSocket protocol", () => {
    it("gives each connection its own orchestrator", async () => {
      await connect();
      await connect();
      expect(orchestrators).toHaveLength(2);
      expect(orchestrators[0]).not.toBe(orchestrators[1]);
    });

    it("answers malformed JSON with INVALID_MESSAGE", async () => {
      const client = await connect();
      client.sendText("{not json");
      expect(await client.nextMessage()).toEqual({
        type: "error",
        code: "INVALID_MESSAGE",
        message: "The request could not be understood.",
      });
    });

    it("refuses to clock in before a match", async () => {
      const client = await connect();
      client.sendJson({ type: "clock_in" });
      expect(await client.nextMessage()).toEqual({
        type: "error",
        code: "NOT_VERIFIED",
        message: "Verify your face before clocking in or out.",
      });
      expect(employees.clockIn).not.toHaveBeenCalled();
    });

    it("discards frames sent before start_verification", async () => {
      const client = await connect();
      client.sendBinary(await makeFaceFrame(1));
      client.sendJson({ type: "clock_out" });

      expect(typeOf(await client.nextMessage())).toBe("error");
      expect(verify).not.toHaveBeenCalled();
    });

    it("verifies a face, then clocks the matched employee in and out", async () => {
      const client = await connect();
      await startVerification(client, "E001");

      client.sendBinary(await makeFaceFrame(1));
      expect(await client.nextMessage()).toEqual({
        type: "state_change",
        state: { status: "processing" },
        progress: 1,
      });
      expect(await client.nextMessage()).toEqual({
        type: "state_change",
        state: { status: "matched", name: "Ada Lovelace" },
        progress: 1,
      });
      expect(verify.mock.calls[0][0]).toBe("E001");
      expect(await client.nextMessage()).toEqual({ type: "clock_status", ...CLOCKED_OUT });
      expect(employees.getStatus).toHaveBeenCalledWith("E001");

      client.sendJson({ type: "clock_in" });
      expect(await client.nextMessage()).toEqual({ type: "clock_status", ...CLOCKED_IN });
      expect(employees.clockIn).toHaveBeenCalledWith("E001");

      client.sendJson({ type: "clock_out" });
      expect(await client.nextMessage()).toEqual({ type: "clock_status", ...CLOCKED_OUT });
      expect(employees.clockOut).toHaveBeenCalledWith("E001");
    });

    it("reports a verification failure, then returns to detecting", async () => {
      verify.mockRejectedValueOnce(new VerificationError("FACE_CONFIDENCE_TOO_LOW"));
      const client = await connect();
      await startVerification(client, "E001");

      client.sendBinary(await makeFaceFrame(1));
      await client.nextMessageOfType("state_change");
      const message = "Face not recognized. Try again with better lighting and angle.";
      expect(await client.nextMessage()).toEqual({
        type: "error",
        code: "FACE_CONFIDENCE_TOO_LOW",
        message,
      });
      expect(await client.nextMessage()).toEqual({
        type: "state_change",
        state: { status: "error", code: "FACE_CONFIDENCE_TOO_LOW" },
        progress: 0,
      });
      expect(await client.nextMessage()).toEqual({
        type: "state_change",
        state: { status: "detecting" },
        progress: 0,
      });
    });

    it("reports clock failures from the backend", async () => {
      employees.clockIn.mockRejectedValueOnce(new VerificationError("DB_ERROR"));
      const client = await connect();
      await matchAda(client);

      client.sendJson({ type: "clock_in" });
      expect(await client.nextMessage()).toEqual({
        type: "error",
        code: "DB_ERROR",
        message: "Server error. Please try again later.",
      });
    });

    it("reports a failed status read after a match as an error", async () => {
      employees.getStatus.mockRejectedValueOnce(new VerificationError("DB_ERROR"));
      const client = await connect();
      await startVerification(client, "E001");
      client.sendBinary(await makeFaceFrame(1));
      await client.nextMessageOfType("state_change");
      expect(await client.nextMessage()).toEqual({
        type: "state_change",
        state: { status: "matched", name: "Ada Lovelace" },
        progress: 1,
      });

      expect(await client.nextMessage()).toEqual({
        type: "error",
        code: "DB_ERROR",
        message: "Server error. Please try again later.",
      });
      expect(employees.getStatus).toHaveBeenCalledWith("E001");
    });

    it("drops a clock request while another is in flight", async () => {
      const pending = createDeferred<ClockStatus>();
      employees.clockIn.mockImplementationOnce(() => pending.promise);
      const client = await connect();
      await matchAda(client);

      client.sendJson({ type: "clock_in" });
      client.sendJson({ type: "clock_in" });
      client.sendText("{");
      // The malformed message is answered while the first clock_in is still pending
      expect(await client.nextMessage()).toEqual({
        type: "error",
        code: "INVALID_MESSAGE",
        message: "The request could not be understood.",
      });
      expect(employees.clockIn).toHaveBeenCalledTimes(1);

      pending.resolve(CLOCKED_IN);
      expect(await client.nextMessage()).toEqual({ type: "clock_status", ...CLOCKED_IN });

      // The guard clears once the request settles
      client.sendJson({ type: "clock_out" });
      expect(await client.nextMessage()).toEqual({ type: "clock_status", ...CLOCKED_OUT });
      expect(employees.clockIn).toHaveBeenCalledTimes(1);
      expect(employees.clockOut).toHaveBeenCalledTimes(1);
    });

    it("survives undecodable binary frames", async () => {
      const client = await connect();
      await startVerification(client, "E001");

      client.sendBinary(Buffer.from([0x00, 0x01, 0x02]));
      client.sendBinary(await makeFaceFrame(2));

      expect(await client.nextMessageOfType("state_change")).toEqual({
        type: "state_change",
        state: { status: "processing" },
        progress: 1,
      });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it("stops the orchestrator when the client disconnects", async () => {
      const client = await connect();
      await startVerification(client, "E001");

      client.close();

      await vi.waitFor(() => expect(orchestrators[0].isRunning).toBe(false));
    });
  });
});

// ─── Pure Helpers ───────────────────────────────────────────────────────────────

describe("parseClientMessage", () => {
  it("parses each control message", () => {
    expect(parseClientMessage('{"type":"start_verification","employeeId":"E001"}')).toEqual({
      type: "start_verification",
      employeeId: "E001",
    });
    expect(parseClientMessage('{"type":"stop_verification"}')).toEqual({ type: "stop_verification" });
    expect(parseClientMessage('{"type":"clock_in","extra":1}')).toEqual({ type: "clock_in" });
    expect(parseClientMessage('{"type":"clock_out"}')).toEqual({ type: "clock_out" });
  });

  it("rejects malformed or unknown messages", () => {
    expect(parseClientMessage("not json")).toBeNull();
    expect(parseClientMessage("[]")).toBeNull();
    expect(parseClientMessage('{"type":"start_verification","employeeId":42}')).toBeNull();
    expect(parseClientMessage('{"type":"start_recording"}')).toBeNull();
  });
});

describe("parseRegistrationRequest", () => {
  it("trims the text fields and decodes the photo", () => {
    expect(parseRegistrationRequest(registrationBody({ role: undefined }))).toEqual({
      employeeId: "E9",
      name: "Ann Lee",
      role: "",
      image: PHOTO,
      face: makeReportedFace(),
    });
  });

  it("rejects incomplete or malformed bodies", () => {
    expect(parseRegistrationRequest(null)).toBeNull();
    expect(parseRegistrationRequest(registrationBody({ employeeId: "  " }))).toBeNull();
    expect(parseRegistrationRequest(registrationBody({ name: 7 }))).toBeNull();
    expect(parseRegistrationRequest(registrationBody({ role: 7 }))).toBeNull();
    expect(parseRegistrationRequest(registrationBody({ image: "" }))).toBeNull();
    expect(parseRegistrationRequest(registrationBody({ face: undefined }))).toBeNull();
  });
});

describe("httpStatusFor", () => {
  it("maps error codes onto HTTP statuses", () => {
    expect(httpStatusFor("INVALID_MESSAGE")).toBe(400);
    expect(httpStatusFor("UNAUTHORIZED")).toBe(401);
    expect(httpStatusFor("EMPLOYEE_NOT_FOUND")).toBe(404);
    expect(httpStatusFor("EMPLOYEE_ALREADY_EXISTS")).toBe(409);
    expect(httpStatusFor("FACE_VALIDATION_FAILED")).toBe(422);
    expect(httpStatusFor("REGISTRATION_DISABLED")).toBe(503);
    expect(httpStatusFor("REQUEST_TIMED_OUT")).toBe(504);
    expect(httpStatusFor("NETWORK_UNAVAILABLE")).toBe(502);
  });
});
