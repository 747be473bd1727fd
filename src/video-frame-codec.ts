/**
 * Binary frame codec for FV-prefixed wire format.
 *
 * Wire format: [0x46 0x56 magic ("FV")][type byte][3-byte big-endian uint24 header JSON length][UTF-8 header JSON][payload bytes]
 *
 * Video frames: type byte 0x56, payload = JPEG bytes. The header optionally
 * carries the face found by the capture client's detector.
 */

import type { Frame, FrameHeader, Point, Rect, ReportedFace } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const FV_MAGIC_0 = 0x46; // 'F'
const FV_MAGIC_1 = 0x56; // 'V'
const TYPE_VIDEO = 0x56; // 'V'

/** Minimum valid frame size: 2 (magic) + 1 (type) + 3 (header len) = 6 bytes */
const MIN_FRAME_SIZE = 6;

/** Maximum header JSON size in bytes */
export const MAX_HEADER_JSON_BYTES = 4096;

/** Maximum JPEG payload size for video frames (2 MB) */
export const MAX_VIDEO_PAYLOAD_BYTES = 2 * 1024 * 1024;

/** Maximum resolution for video frames */
export const MAX_WIDTH = 1920;
export const MAX_HEIGHT = 1080;

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Encode a video frame into the FV-prefixed wire format.
 * Produces: [0x46 0x56][0x56][uint24 header len][header JSON][JPEG bytes]
 */
export function encodeVideoFrame(header: FrameHeader, jpegBuffer: Buffer): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), "utf-8");
  const totalLen = MIN_FRAME_SIZE + headerJson.length + jpegBuffer.length;
  const buf = Buffer.alloc(totalLen);

  let offset = 0;
  buf[offset++] = FV_MAGIC_0;
  buf[offset++] = FV_MAGIC_1;
  buf[offset++] = TYPE_VIDEO;

  // Write uint24 big-endian header length
  buf[offset++] = (headerJson.length >> 16) & 0xff;
  buf[offset++] = (headerJson.length >> 8) & 0xff;
  buf[offset++] = headerJson.length & 0xff;

  headerJson.copy(buf, offset);
  offset += headerJson.length;

  jpegBuffer.copy(buf, offset);

  return buf;
}

// ─── Header Validation ──────────────────────────────────────────────────────────

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isPoint(value: unknown): value is Point {
  return isObject(value) && isFiniteNumber(value.x) && isFiniteNumber(value.y);
}

function isRect(value: unknown): value is Rect {
  return (
    isObject(value) &&
    isFiniteNumber(value.x) &&
    isFiniteNumber(value.y) &&
    isFiniteNumber(value.width) &&
    isFiniteNumber(value.height) &&
    value.width > 0 &&
    value.height > 0
  );
}

/**
 * Validate a client-reported face. captureQuality may be absent or null
 * (client could not score it) but otherwise must lie in [0, 1].
 */
export function isValidReportedFace(value: unknown): value is ReportedFace {
  if (!isObject(value)) return false;
  if (!isRect(value.boundingBox)) return false;

  const { landmarks, captureQuality } = value;
  if (!isObject(landmarks)) return false;
  if (!isPoint(landmarks.leftEye) || !isPoint(landmarks.rightEye) || !isPoint(landmarks.nose)) {
    return false;
  }

  if (captureQuality === undefined || captureQuality === null) return true;
  return isFiniteNumber(captureQuality) && captureQuality >= 0 && captureQuality <= 1;
}

/**
 * Validate a FrameHeader has all required fields with correct types.
 * Returns true if valid, false otherwise.
 */
export function isValidFrameHeader(obj: unknown): obj is FrameHeader {
  if (!isObject(obj)) return false;

  // timestamp: number >= 0
  if (!isFiniteNumber(obj.timestamp) || obj.timestamp < 0) return false;

  // seq: non-negative integer
  if (typeof obj.seq !== "number" || !Number.isInteger(obj.seq) || obj.seq < 0) return false;

  // width / height: positive integers
  if (typeof obj.width !== "number" || !Number.isInteger(obj.width) || obj.width <= 0) return false;
  if (typeof obj.height !== "number" || !Number.isInteger(obj.height) || obj.height <= 0) return false;

  if (obj.face !== undefined && obj.face !== null && !isValidReportedFace(obj.face)) return false;

  return true;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

/**
 * Decode a video frame from the FV-prefixed wire format.
 * Returns null on malformed input.
 */
export function decodeVideoFrame(data: Buffer): Frame | null {
  // Check minimum size
  if (!Buffer.isBuffer(data) || data.length < MIN_FRAME_SIZE) return null;

  if (!isVideoFrame(data)) return null;

  // Read uint24 big-endian header length
  const headerLen = (data[3] << 16) | (data[4] << 8) | data[5];

  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) return null;
  if (data.length < MIN_FRAME_SIZE + headerLen) return null;

  let header: unknown;
  try {
    header = JSON.parse(data.toString("utf-8", MIN_FRAME_SIZE, MIN_FRAME_SIZE + headerLen));
  } catch {
    return null;
  }

  if (!isValidFrameHeader(header)) return null;
  if (header.width > MAX_WIDTH || header.height > MAX_HEIGHT) return null;

  const image = data.subarray(MIN_FRAME_SIZE + headerLen);
  if (image.length === 0 || image.length > MAX_VIDEO_PAYLOAD_BYTES) return null;

  return { header, image };
}

// ─── Inspection ─────────────────────────────────────────────────────────────────

/**
 * Check if a buffer is an FV-prefixed video frame.
 * Checks magic prefix 0x46 0x56 and type byte 0x56.
 */
export function isVideoFrame(data: Buffer): boolean {
  if (!Buffer.isBuffer(data) || data.length < 3) return false;
  return data[0] === FV_MAGIC_0 && data[1] === FV_MAGIC_1 && data[2] === TYPE_VIDEO;
}
