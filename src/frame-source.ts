/**
 * Camera collaborator.
 *
 * A FrameSource delivers frames to a single handler between start() and
 * stop(). Once stop() resolves the handler is never called again.
 */

import type { Frame } from "./types.js";

export type FrameHandler = (frame: Frame) => void;

export interface FrameSource {
  start(onFrame: FrameHandler): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Frame source fed from outside, e.g. by a WebSocket connection decoding
 * binary messages. Frames pushed while stopped are discarded.
 */
export class PushFrameSource implements FrameSource {
  private handler: FrameHandler | null = null;

  get active(): boolean {
    return this.handler !== null;
  }

  start(onFrame: FrameHandler): Promise<void> {
    this.handler = onFrame;
    return Promise.resolve();
  }

  stop(): Promise<void> {
    this.handler = null;
    return Promise.resolve();
  }

  /** Returns false when the frame was discarded because the source is stopped. */
  push(frame: Frame): boolean {
    if (!this.handler) return false;
    this.handler(frame);
    return true;
  }
}
