// Error-reporting collaborator: one call per surfaced hard failure.

import type { VerificationError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface ErrorReporter {
  report(error: VerificationError): void;
}

/** Writes each surfaced failure to the log at ERROR level, optionally prefixed. */
export class LoggingErrorReporter implements ErrorReporter {
  private readonly logger: Logger;
  private readonly context: string | null;

  constructor(logger: Logger, context?: string) {
    this.logger = logger;
    this.context = context ?? null;
  }

  report(error: VerificationError): void {
    const line = error.describe();
    this.logger.error(this.context ? `${this.context}: ${line}` : line);
  }
}
