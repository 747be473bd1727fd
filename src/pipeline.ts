// Per-connection pipeline assembly.
//
// Shared, stateless collaborators (face processor, verifier) are built once at
// startup. Stateful ones (collector, sampler, orchestrator) are built per
// connection by the factory returned here.

import type { PipelineConfig } from "./types.js";
import type { FaceDetector } from "./face-analyzer.js";
import type { FaceProcessing } from "./face-processor.js";
import type { Verifier } from "./verification-client.js";
import type { OrchestratorFactory } from "./server.js";
import type { Clock } from "./frame-collector.js";
import { FaceAnalyzer } from "./face-analyzer.js";
import { FaceValidator } from "./face-validator.js";
import { FrameCollector } from "./frame-collector.js";
import { FrameSampler } from "./frame-sampler.js";
import { VerificationOrchestrator } from "./verification-orchestrator.js";
import { createConsoleLogger } from "./logger.js";

export interface PipelineDeps {
  config: PipelineConfig;
  detector: FaceDetector;
  processor: FaceProcessing;
  verifier: Verifier;
  clock?: Clock;
}

export function createOrchestratorFactory(deps: PipelineDeps): OrchestratorFactory {
  const { config, detector, processor, verifier, clock } = deps;
  const validator = new FaceValidator(config.validation, createConsoleLogger("FaceValidator"));
  const analyzer = new FaceAnalyzer(detector, validator, createConsoleLogger("FaceAnalyzer"));

  return (io) =>
    new VerificationOrchestrator({
      source: io.source,
      analyzer,
      collector: new FrameCollector(config.collector, clock),
      processor,
      verifier,
      reporter: io.reporter,
      sampler: config.maxAdmissionRate > 0 ? new FrameSampler(config.maxAdmissionRate) : undefined,
      logger: createConsoleLogger(`Orchestrator ${io.connectionId.slice(0, 8)}`),
      onStateChange: io.onStateChange,
    });
}
