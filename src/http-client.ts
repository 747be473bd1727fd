/**
 * HttpClient: JSON over HTTP with a per-request timeout and typed failures.
 *
 * Two layers:
 *   - requestJson(): raw JSON body, transport errors mapped to ErrorCodes
 *   - requestEnvelope() / send(): backend envelope `{ success, data, code, message }`
 *     unwrapped, snake_case keys converted to camelCase, payload decoded
 *
 * Failure mapping:
 *   timeout              → REQUEST_TIMED_OUT
 *   caller abort         → CancelledError
 *   unbuildable URL      → BAD_URL
 *   connection failure   → NETWORK_UNAVAILABLE
 *   non-JSON body        → DECODING_FAILED
 *   malformed envelope   → INVALID_RESPONSE
 *   success: false       → backend code (unrecognized → UNKNOWN)
 */

import type { ApiEnvelope, ErrorCode } from "./types.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { CancelledError, VerificationError, errorCodeFromBackend } from "./errors.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST";

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
  /** Extra request headers, e.g. credentials. */
  headers?: Record<string, string>;
  /** Convert request keys to snake_case and response keys to camelCase. Default true. */
  convertKeys?: boolean;
}

/** Turns the unwrapped envelope payload into a typed value, or null if it does not fit. */
export type Decoder<T> = (data: unknown) => T | null;

// ─── Key Conversion ─────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function snakeToCamel(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

function camelToSnake(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

function convertKeys(value: unknown, convert: (key: string) => string): unknown {
  if (Array.isArray(value)) return value.map((v) => convertKeys(v, convert));
  if (!isPlainObject(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    out[convert(key)] = convertKeys(v, convert);
  }
  return out;
}

export function toCamelCaseKeys(value: unknown): unknown {
  return convertKeys(value, snakeToCamel);
}

export function toSnakeCaseKeys(value: unknown): unknown {
  return convertKeys(value, camelToSnake);
}

// ─── Envelope ───────────────────────────────────────────────────────────────────

/** Read a parsed body as a response envelope, or null when it is not one. */
export function parseEnvelope(body: unknown): ApiEnvelope<unknown> | null {
  if (!isPlainObject(body) || typeof body.success !== "boolean") return null;
  return {
    success: body.success,
    data: body.data ?? null,
    code: typeof body.code === "string" ? body.code : null,
    message: typeof body.message === "string" ? body.message : null,
  };
}

// ─── Client ─────────────────────────────────────────────────────────────────────

export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  /** Perform a request and return the parsed JSON body. Non-2xx statuses are not errors here. */
  async requestJson(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<{ status: number; body: unknown }> {
    const url = this.buildUrl(path, options.query);
    const convert = options.convertKeys ?? true;

    if (options.signal?.aborted) throw new CancelledError();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    const headers: Record<string, string> = { Accept: "application/json", ...options.headers };
    const init: RequestInit = { method, headers, signal: controller.signal };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(convert ? toSnakeCaseKeys(options.body) : options.body);
    }

    let status: number;
    let text: string;
    try {
      const response = await this.fetchImpl(url, init);
      status = response.status;
      text = await response.text();
    } catch (err) {
      if (timedOut) {
        throw new VerificationError("REQUEST_TIMED_OUT", {
          debugMessage: `${method} ${path} exceeded ${this.timeoutMs}ms`,
          cause: err,
        });
      }
      if (options.signal?.aborted) throw new CancelledError();
      const code: ErrorCode = err instanceof TypeError ? "NETWORK_UNAVAILABLE" : "UNKNOWN";
      this.logger.warn(
        `${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      throw new VerificationError(code, { debugMessage: `${method} ${path}`, cause: err });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new VerificationError("DECODING_FAILED", {
        debugMessage: `${method} ${path} returned HTTP ${status} with a non-JSON body`,
        cause: err,
      });
    }

    return { status, body: convert ? toCamelCaseKeys(parsed) : parsed };
  }

  /**
   * Perform an envelope request and return its `data`, or null when the
   * backend sent none.
   * @throws VerificationError with the backend's code when `success` is false
   */
  async requestEnvelope(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const { status, body } = await this.requestJson(method, path, options);

    const envelope = parseEnvelope(body);
    if (!envelope) {
      throw new VerificationError("INVALID_RESPONSE", {
        debugMessage: `${method} ${path} returned HTTP ${status} without a response envelope`,
      });
    }

    if (!envelope.success) {
      const { code, message } = envelope;
      throw new VerificationError(errorCodeFromBackend(code), {
        debugMessage: `${method} ${path}: ${code ?? "no code"}${message ? ` (${message})` : ""}`,
      });
    }

    return envelope.data;
  }

  /** Envelope request whose `data` is required and must decode. */
  async send<T>(
    method: HttpMethod,
    path: string,
    decode: Decoder<T>,
    options: RequestOptions = {},
  ): Promise<T> {
    const data = await this.requestEnvelope(method, path, options);
    const value = data === null ? null : decode(data);
    if (value === null) {
      throw new VerificationError("INVALID_RESPONSE", {
        debugMessage: `${method} ${path} returned an unexpected payload`,
      });
    }
    return value;
  }

  private buildUrl(path: string, query?: Record<string, string>): string {
    let url: URL;
    try {
      url = new URL(`${this.baseUrl}${path}`);
    } catch (err) {
      throw new VerificationError("BAD_URL", {
        debugMessage: `cannot build URL from "${this.baseUrl}" and "${path}"`,
        cause: err,
      });
    }
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }
}
