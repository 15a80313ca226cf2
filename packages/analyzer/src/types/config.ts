/**
 * Analyzer configuration record
 */

import { createDiagnostic, type Diagnostic } from "./diagnostic.js";
import { error, ok, type Result } from "./result.js";

/**
 * 0: none, 1: local modules, 2: +installed packages, 3: +standard library
 */
export type FollowImportsLevel = 0 | 1 | 2 | 3;

export type AnalyzerConfig = {
  readonly followImports: FollowImportsLevel;
  readonly excludeImports: readonly RegExp[];
  readonly excludeNames: readonly RegExp[];
  readonly strict: boolean;
  readonly threshold: number;
  readonly maxIterations: number;
  readonly searchPaths: readonly string[];
  readonly grammarPath?: string;
};

export type ConfigInput = {
  readonly followImports?: number;
  readonly excludeImports?: readonly string[];
  readonly excludeNames?: readonly string[];
  readonly strict?: boolean;
  readonly threshold?: number;
  readonly maxIterations?: number;
  readonly searchPaths?: readonly string[];
  readonly grammarPath?: string;
};

export const DEFAULT_MAX_ITERATIONS = 32;

const isFollowImportsLevel = (value: number): value is FollowImportsLevel =>
  value === 0 || value === 1 || value === 2 || value === 3;

const invalid = (message: string): Result<AnalyzerConfig, Diagnostic> =>
  error(createDiagnostic("ATR9001", "error", message));

/**
 * Compile a pattern so that it must match the whole name
 */
export const compilePattern = (pattern: string): Result<RegExp, string> => {
  try {
    return ok(new RegExp(`^(?:${pattern})$`));
  } catch (e) {
    return error(e instanceof Error ? e.message : String(e));
  }
};

const compilePatterns = (
  patterns: readonly string[],
  option: string
): Result<readonly RegExp[], Diagnostic> => {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    const result = compilePattern(pattern);
    if (!result.ok) {
      return error(
        createDiagnostic(
          "ATR9001",
          "error",
          `Invalid ${option} pattern '${pattern}': ${result.error}`
        )
      );
    }
    compiled.push(result.value);
  }
  return ok(compiled);
};

/**
 * Fill defaults and validate a configuration record
 */
export const createConfig = (
  input: ConfigInput = {}
): Result<AnalyzerConfig, Diagnostic> => {
  const followImports = input.followImports ?? 1;
  if (!isFollowImportsLevel(followImports)) {
    return invalid(
      `Follow-imports level must be 0, 1, 2 or 3 (got ${followImports})`
    );
  }

  const threshold = input.threshold ?? 0;
  if (!Number.isInteger(threshold) || threshold < 0) {
    return invalid(`Threshold must be a non-negative integer (got ${threshold})`);
  }

  const maxIterations = input.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    return invalid(
      `Iteration cap must be a positive integer (got ${maxIterations})`
    );
  }

  const excludeImports = compilePatterns(
    input.excludeImports ?? [],
    "exclude-import"
  );
  if (!excludeImports.ok) {
    return excludeImports;
  }

  const excludeNames = compilePatterns(input.excludeNames ?? [], "exclude");
  if (!excludeNames.ok) {
    return excludeNames;
  }

  return ok({
    followImports,
    excludeImports: excludeImports.value,
    excludeNames: excludeNames.value,
    strict: input.strict ?? false,
    threshold,
    maxIterations,
    searchPaths: input.searchPaths ?? [],
    grammarPath: input.grammarPath,
  });
};

export const matchesAny = (
  patterns: readonly RegExp[],
  name: string
): boolean => patterns.some((pattern) => pattern.test(name));
