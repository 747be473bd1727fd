/**
 * VerificationOrchestrator: drives one verification session.
 *
 * State machine:
 *
 *   DETECTING ──winner──▶ PROCESSING ──ok──▶ MATCHED (terminal until stop/start)
 *       ▲                     │
 *       └──── ERROR / TIMED_OUT ◀──failure
 *
 * Frame intake is a test-and-set gate: onFrame() admits a frame only when no
 * unit of work is in flight, and returns immediately either way. An admitted
 * frame runs analyze → collect → embed → verify as one cancellable unit.
 *
 * Cancellation: stop() bumps `runId` and aborts the unit's AbortSignal. Every
 * await in the unit is followed by a runId check; a stale unit publishes
 * nothing, reports nothing and leaves the busy flag alone.
 *
 * Notifications: a hard failure reaches the reporter exactly once, and the
 * reporter carries the user-facing message. Published states are state only;
 * the Error state names the code and nothing more.
 */

import type {
  Frame,
  VerificationMatch,
  VerificationState,
} from "./types.js";
import type { FrameAnalyzing } from "./face-analyzer.js";
import type { FrameCollector } from "./frame-collector.js";
import type { FaceProcessing } from "./face-processor.js";
import type { Verifier } from "./verification-client.js";
import type { ErrorReporter } from "./error-reporter.js";
import type { FrameSource } from "./frame-source.js";
import type { FrameSampler } from "./frame-sampler.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { VerificationError, isCancellation, toVerificationError } from "./errors.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface VerificationOrchestratorDeps {
  source: FrameSource;
  analyzer: FrameAnalyzing;
  collector: FrameCollector;
  processor: FaceProcessing;
  verifier: Verifier;
  reporter: ErrorReporter;
  /** Admission throttle applied after the busy check. */
  sampler?: FrameSampler;
  logger?: Logger;
  onStateChange?: (state: VerificationState, progress: number) => void;
}

export interface IntakeStats {
  admitted: number;
  droppedBusy: number;
  droppedThrottled: number;
}

const DETECTING: VerificationState = { status: "detecting" };

// ─── Orchestrator ───────────────────────────────────────────────────────────────

export class VerificationOrchestrator {
  private readonly deps: VerificationOrchestratorDeps;
  private readonly logger: Logger;

  private currentState: VerificationState = DETECTING;
  private currentProgress = 0;
  private targetEmployeeId: string | null = null;
  private matched: VerificationMatch | null = null;

  private running = false;
  private busy = false;
  private runId = 0;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;

  private readonly stats: IntakeStats = { admitted: 0, droppedBusy: 0, droppedThrottled: 0 };

  constructor(deps: VerificationOrchestratorDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
  }

  // ─── Accessors ──────────────────────────────────────────────────────────────

  get state(): VerificationState {
    return this.currentState;
  }

  get progress(): number {
    return this.currentProgress;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** The confirmed identity once Matched, otherwise null. */
  get match(): VerificationMatch | null {
    return this.matched;
  }

  get employeeId(): string | null {
    return this.targetEmployeeId;
  }

  getStats(): IntakeStats {
    return { ...this.stats };
  }

  /** Resolves when the most recently admitted unit of work has settled. */
  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  setTargetEmployee(employeeId: string | null): void {
    const trimmed = employeeId?.trim() ?? "";
    this.targetEmployeeId = trimmed.length > 0 ? trimmed : null;
  }

  /**
   * Start the frame source. A source that fails to start is surfaced as
   * CAMERA_START_FAILED and the orchestrator stays stopped.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      await this.deps.source.start((frame) => this.onFrame(frame));
      this.logger.info(`Started${this.targetEmployeeId ? ` for employee ${this.targetEmployeeId}` : ""}`);
    } catch (err) {
      this.running = false;
      this.surface(new VerificationError("CAMERA_START_FAILED", { cause: err }));
    }
  }

  /**
   * Cancel outstanding work, clear the gate, reset the collector and return to
   * Detecting, then stop the frame source.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.cancelInFlight();
    this.deps.collector.reset();
    this.deps.sampler?.reset();
    this.matched = null;
    this.publish(DETECTING, 0);
    await this.deps.source.stop();
  }

  // ─── Frame intake ───────────────────────────────────────────────────────────

  onFrame(frame: Frame): void {
    if (!this.running || this.currentState.status === "matched") return;

    if (this.busy) {
      this.stats.droppedBusy++;
      return;
    }
    if (this.deps.sampler && !this.deps.sampler.shouldSample(frame.header.timestamp)) {
      this.stats.droppedThrottled++;
      return;
    }

    this.busy = true;
    this.stats.admitted++;

    const runId = this.runId;
    const controller = new AbortController();
    this.controller = controller;

    const unit: Promise<void> = this.runUnit(frame, runId, controller.signal).finally(() => {
      if (this.runId === runId) {
        this.busy = false;
        this.controller = null;
      }
      if (this.inFlight === unit) this.inFlight = null;
    });
    this.inFlight = unit;
  }

  // ─── Unit of work ───────────────────────────────────────────────────────────

  private async runUnit(frame: Frame, runId: number, signal: AbortSignal): Promise<void> {
    try {
      const analysis = await this.deps.analyzer.analyze(frame);
      if (this.runId !== runId) return;

      if (!analysis) {
        this.deps.collector.reset();
        this.publish(DETECTING, 0);
        return;
      }

      const { winner, progress } = this.deps.collector.process({
        face: analysis.face,
        frame,
        quality: analysis.quality,
      });
      if (!winner) {
        this.publish(DETECTING, progress);
        return;
      }

      this.logger.debug(`Winner: frame ${winner.frame.header.seq} (quality ${winner.quality.toFixed(3)})`);
      this.publish({ status: "processing" }, 1);

      const employeeId = this.targetEmployeeId;
      if (!employeeId) {
        throw new VerificationError("EMPLOYEE_NOT_FOUND", {
          debugMessage: "no target employee selected",
        });
      }

      const embedding = await this.deps.processor.process(winner.frame, winner.face, signal);
      if (this.runId !== runId) return;

      const match = await this.deps.verifier.verify(employeeId, embedding, signal);
      if (this.runId !== runId) return;

      this.matched = match;
      this.logger.info(`Matched employee ${match.employeeId}`);
      this.publish({ status: "matched", name: match.name }, 1);
    } catch (err) {
      if (this.runId !== runId || isCancellation(err)) return;
      this.surface(toVerificationError(err));
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  /** Report a hard failure once, show it, then return to Detecting. */
  private surface(error: VerificationError): void {
    this.deps.reporter.report(error);
    if (error.code === "REQUEST_TIMED_OUT") {
      this.publish({ status: "timed_out" }, 0);
    } else {
      this.publish({ status: "error", code: error.code }, 0);
    }
    this.publish(DETECTING, 0);
  }

  private cancelInFlight(): void {
    this.runId++;
    this.controller?.abort();
    this.controller = null;
    this.busy = false;
  }

  private publish(state: VerificationState, progress: number): void {
    if (
      state.status === this.currentState.status &&
      state.status === "detecting" &&
      progress === this.currentProgress
    ) {
      return;
    }
    this.currentState = state;
    this.currentProgress = progress;
    this.deps.onStateChange?.(state, progress);
  }
}
