/**
 * VerificationClient: submits an embedding for identity confirmation.
 *
 * A successful envelope means the backend accepted the face as the given
 * employee. Every other outcome throws a VerificationError:
 *   EMPLOYEE_NOT_FOUND, FACE_CONFIDENCE_TOO_LOW (backend verdicts),
 *   NETWORK_UNAVAILABLE, REQUEST_TIMED_OUT, INVALID_RESPONSE, ... (transport).
 * No retries.
 */

import type { FaceEmbedding, VerificationMatch } from "./types.js";
import type { HttpClient } from "./http-client.js";

export const VERIFY_PATH = "/employees/verify";

export interface Verifier {
  verify(employeeId: string, embedding: FaceEmbedding, signal?: AbortSignal): Promise<VerificationMatch>;
}

function readName(data: unknown): string | null {
  if (typeof data !== "object" || data === null || !("name" in data)) return null;
  return typeof data.name === "string" && data.name.length > 0 ? data.name : null;
}

export class VerificationClient implements Verifier {
  private readonly http: HttpClient;

  constructor(http: HttpClient) {
    this.http = http;
  }

  async verify(
    employeeId: string,
    embedding: FaceEmbedding,
    signal?: AbortSignal,
  ): Promise<VerificationMatch> {
    const data = await this.http.requestEnvelope("POST", VERIFY_PATH, {
      body: { employeeId, embedding: embedding.values },
      signal,
    });
    // Backends that return the employee record give us a display name.
    return { employeeId, name: readName(data) ?? employeeId };
  }
}
