/**
 * Build Diagnostics
 *
 * Non-fatal advisories raised while merging, naming and inheriting. Every
 * advisory is kept for the caller and logged at warn.
 *
 * @module
 */

import { createLogger, type Logger } from "../../utils/logger.js";

export type AdvisoryKind =
  | "MergeConflict"
  | "NameConflict"
  | "SelfShadow"
  | "InconsistentHierarchy";

export interface Advisory {
  kind: AdvisoryKind;
  message: string;
  /** Structured context: handles, names, attribute */
  details: Record<string, unknown>;
}

const defaultLogger = createLogger("diagnostics");

export class Diagnostics {
  private readonly entries: Advisory[] = [];

  constructor(private readonly logger: Logger = defaultLogger) {}

  report(kind: AdvisoryKind, message: string, details: Record<string, unknown> = {}): Advisory {
    const advisory: Advisory = { kind, message, details };
    this.entries.push(advisory);
    this.logger.warn({ advisory: kind, ...details }, message);
    return advisory;
  }

  get advisories(): readonly Advisory[] {
    return this.entries;
  }

  ofKind(kind: AdvisoryKind): Advisory[] {
    return this.entries.filter((advisory) => advisory.kind === kind);
  }

  get size(): number {
    return this.entries.length;
  }
}
