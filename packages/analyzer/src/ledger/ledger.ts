/**
 * Severity ledger ("badness") - weighted diagnostics per file
 *
 * INVARIANT: records are never removed once recorded.
 */

import type {
  Diagnostic,
  DiagnosticSeverity,
} from "../types/diagnostic.js";

export type DiagnosticsSink = (diagnostic: Diagnostic) => void;

/**
 * Totals for diagnostics without a location are kept under this key
 */
export const RUN_SCOPE = "<run>";

export const severityWeight = (severity: DiagnosticSeverity): number => {
  switch (severity) {
    case "info":
      return 0;
    case "warning":
      return 1;
    case "error":
      return 5;
    case "fatal":
      return Number.POSITIVE_INFINITY;
  }
};

/**
 * Raised by `record` for a fatal diagnostic. Caught at the boundary of the
 * module that owns `file`; it never leaves the analyzer's public API.
 */
export class FileAnalysisAborted extends Error {
  readonly file: string;
  readonly diagnostic: Diagnostic;

  constructor(file: string, diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "FileAnalysisAborted";
    this.file = file;
    this.diagnostic = diagnostic;
  }
}

export type SeverityLedger = {
  readonly record: (diagnostic: Diagnostic) => void;
  readonly total: (file: string) => number;
  readonly overall: () => number;
  readonly exceeds: (threshold: number, file?: string) => boolean;
  readonly records: () => readonly Diagnostic[];
};

export type LedgerOptions = {
  readonly strict?: boolean;
  readonly sink?: DiagnosticsSink;
};

export const createSeverityLedger = (
  options: LedgerOptions = {}
): SeverityLedger => {
  const recorded: Diagnostic[] = [];
  const totals = new Map<string, number>();
  let sum = 0;

  const record = (diagnostic: Diagnostic): void => {
    const effective: Diagnostic =
      options.strict && diagnostic.severity === "error"
        ? { ...diagnostic, severity: "fatal" }
        : diagnostic;
    const file = effective.location?.file ?? RUN_SCOPE;
    const weight = severityWeight(effective.severity);

    recorded.push(effective);
    totals.set(file, (totals.get(file) ?? 0) + weight);
    sum += weight;
    options.sink?.(effective);

    if (effective.severity === "fatal") {
      throw new FileAnalysisAborted(file, effective);
    }
  };

  const total = (file: string): number => totals.get(file) ?? 0;

  return {
    record,
    total,
    overall: () => sum,
    exceeds: (threshold, file) =>
      (file === undefined ? sum : total(file)) > threshold,
    records: () => [...recorded],
  };
};
