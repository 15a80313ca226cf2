/**
 * Diagnostic types for the attrtrace analyzer
 */

export type DiagnosticSeverity = "info" | "warning" | "error" | "fatal";

export const DIAGNOSTIC_CODES = [
  "ATR1001", // Module could not be located
  "ATR1002", // Source could not be parsed
  "ATR1003", // Source file could not be read
  "ATR1004", // Star import could not be expanded
  "ATR1005", // Import assumed to be third-party
  "ATR2001", // Name is potentially undefined
  "ATR2002", // Name redefined at module level
  "ATR3001", // Dynamic attribute name
  "ATR3002", // Class initialised but not stored
  "ATR3003", // Closure folded into enclosing function
  "ATR3004", // Nested class body not analysed
  "ATR3005", // Global write from nested function not supported
  "ATR3006", // Call to a local value cannot be resolved
  "ATR3007", // Method call target unknown
  "ATR4001", // Annotation override argument is not a literal
  "ATR4002", // Annotation override has an invalid shape
  "ATR5001", // Call binding failed
  "ATR5002", // Fixed-point iteration cap reached
  "ATR5003", // Call target has no analysed body
  "ATR6001", // Internal analyzer error
  "ATR9001", // Invalid configuration
] as const;

export type DiagnosticCode = (typeof DIAGNOSTIC_CODES)[number];

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

/**
 * Location covering a whole file, used when no source position applies
 */
export const fileLocation = (file: string): SourceLocation => ({
  file,
  line: 0,
  column: 0,
  length: 0,
});

export const isDiagnosticCode = (value: string): value is DiagnosticCode =>
  DIAGNOSTIC_CODES.some((code) => code === value);

export const isErrorOrWorse = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error" || diagnostic.severity === "fatal";

export const formatDiagnostic = (
  diagnostic: Diagnostic,
  formatPath: (path: string) => string = (path) => path
): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    const file = formatPath(diagnostic.location.file);
    parts.push(
      diagnostic.location.line > 0
        ? `${file}:${diagnostic.location.line}:${diagnostic.location.column}`
        : file
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
