// Shared builders for pipeline tests: synthetic frames and faces.

import sharp from "sharp";
import type { FaceDescriptor, Frame, FrameHeader, ReportedFace } from "./types.js";

export const FRAME_WIDTH = 320;
export const FRAME_HEIGHT = 240;

/** Frontal face, eyes level, nose centred, well inside a 320x240 frame. */
export function makeReportedFace(overrides?: Partial<ReportedFace>): ReportedFace {
  return {
    boundingBox: { x: 100, y: 60, width: 120, height: 140 },
    landmarks: {
      leftEye: { x: 130, y: 110 },
      rightEye: { x: 190, y: 110 },
      nose: { x: 160, y: 150 },
    },
    captureQuality: 0.5,
    ...overrides,
  };
}

export function makeFaceDescriptor(overrides?: Partial<FaceDescriptor>): FaceDescriptor {
  return { ...makeReportedFace(), brightness: 0.5, ...overrides };
}

export function makeHeader(overrides?: Partial<FrameHeader>): FrameHeader {
  return { timestamp: 0, seq: 0, width: FRAME_WIDTH, height: FRAME_HEIGHT, ...overrides };
}

/** A frame whose image bytes are never decoded (analyzer and processor are faked). */
export function makeFrame(seq: number, face?: ReportedFace | null): Frame {
  return {
    header: makeHeader({ seq, timestamp: seq / 30, face }),
    image: Buffer.from([0xff, 0xd8, 0xff, 0xd9]),
  };
}

/** Solid-colour JPEG of the given size. */
export function solidJpeg(
  colour: { r: number; g: number; b: number },
  width = FRAME_WIDTH,
  height = FRAME_HEIGHT,
): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: colour } })
    .jpeg({ quality: 95 })
    .toBuffer();
}
