// Employee lookup and time tracking against the backend.

import type { ClockStatus, EmployeeRecord } from "./types.js";
import type { HttpClient } from "./http-client.js";
import { VerificationError } from "./errors.js";

export const SEARCH_PATH = "/employees/search";

export function clockPath(employeeId: string, action: "in" | "out" | "status"): string {
  return `/clock/${encodeURIComponent(employeeId)}/${action}`;
}

// ─── Decoders ───────────────────────────────────────────────────────────────────

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeEmployee(value: unknown): EmployeeRecord | null {
  if (!isObject(value)) return null;
  const { employeeId, name, role } = value;
  if (typeof employeeId !== "string" || typeof name !== "string") return null;
  return { employeeId, name, role: typeof role === "string" ? role : "" };
}

export function decodeEmployeeList(value: unknown): EmployeeRecord[] | null {
  if (!Array.isArray(value)) return null;
  const out: EmployeeRecord[] = [];
  for (const item of value) {
    const employee = decodeEmployee(item);
    if (!employee) return null;
    out.push(employee);
  }
  return out;
}

export function decodeClockStatus(value: unknown): ClockStatus | null {
  if (!isObject(value)) return null;
  const { isClockedIn, clockInTime } = value;
  if (typeof isClockedIn !== "boolean") return null;
  if (typeof clockInTime === "string") return { isClockedIn, clockInTime };
  if (clockInTime === undefined || clockInTime === null) return { isClockedIn, clockInTime: null };
  return null;
}

// ─── Service ────────────────────────────────────────────────────────────────────

export interface EmployeeDirectory {
  search(prefix: string, signal?: AbortSignal): Promise<EmployeeRecord[]>;
  clockIn(employeeId: string): Promise<ClockStatus>;
  clockOut(employeeId: string): Promise<ClockStatus>;
  getStatus(employeeId: string): Promise<ClockStatus>;
}

export class EmployeeService implements EmployeeDirectory {
  private readonly http: HttpClient;

  constructor(http: HttpClient) {
    this.http = http;
  }

  /** Employees whose id or name starts with `prefix`. No data from the backend means no matches. */
  async search(prefix: string, signal?: AbortSignal): Promise<EmployeeRecord[]> {
    const data = await this.http.requestEnvelope("GET", SEARCH_PATH, { query: { prefix }, signal });
    if (data === null) return [];

    const employees = decodeEmployeeList(data);
    if (!employees) {
      throw new VerificationError("INVALID_RESPONSE", {
        debugMessage: `GET ${SEARCH_PATH} returned an unexpected employee list`,
      });
    }
    return employees;
  }

  clockIn(employeeId: string): Promise<ClockStatus> {
    return this.http.send("POST", clockPath(employeeId, "in"), decodeClockStatus);
  }

  clockOut(employeeId: string): Promise<ClockStatus> {
    return this.http.send("POST", clockPath(employeeId, "out"), decodeClockStatus);
  }

  getStatus(employeeId: string): Promise<ClockStatus> {
    return this.http.send("GET", clockPath(employeeId, "status"), decodeClockStatus);
  }
}
