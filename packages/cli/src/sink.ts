/**
 * Diagnostics printing, filtered by warning level
 */

import {
  formatDiagnostic,
  isErrorOrWorse,
  type Diagnostic,
  type DiagnosticsSink,
} from "@attrtrace/analyzer";
import type { PathFormatter } from "./paths.js";
import type { WarningLevel } from "./types.js";

export type SinkOptions = {
  readonly warningLevel: WarningLevel;
  /** Absolute path of the analysed file, for the "local" level */
  readonly target: string;
  readonly formatPath: PathFormatter;
  readonly write?: (line: string) => void;
};

export const shouldReport = (
  diagnostic: Diagnostic,
  level: WarningLevel,
  target: string
): boolean => {
  if (isErrorOrWorse(diagnostic)) {
    return true;
  }
  if (diagnostic.severity === "info") {
    return level === "all";
  }
  return (
    level === "default" ||
    level === "all" ||
    (level === "local" && diagnostic.location?.file === target)
  );
};

export const createConsoleSink = (options: SinkOptions): DiagnosticsSink => {
  const write = options.write ?? ((line: string) => console.error(line));
  return (diagnostic) => {
    if (shouldReport(diagnostic, options.warningLevel, options.target)) {
      write(formatDiagnostic(diagnostic, options.formatPath));
    }
  };
};
