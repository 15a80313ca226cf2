/**
 * Results cache: reuse a target's results while none of the files that
 * produced them have changed
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  isDiagnosticCode,
  type AnalysisOutput,
  type Diagnostic,
  type DiagnosticSeverity,
  type SourceLocation,
} from "@attrtrace/analyzer";
import type { AnalysisStats, FunctionResults, ResultsJson } from "./output.js";
import type { Result } from "./types.js";

export const CACHE_FORMAT_VERSION = 1;

export type FileDigest = {
  readonly path: string;
  readonly sha256: string;
};

/**
 * The configuration that changes what an analysis produces
 */
export type CacheKey = {
  readonly followImports: number;
  readonly excludeImports: readonly string[];
  readonly exclude: readonly string[];
  readonly strict: boolean;
  readonly searchPaths: readonly string[];
};

export type CacheEntry = {
  readonly version: number;
  readonly target: FileDigest;
  readonly modules: readonly FileDigest[];
  readonly config: CacheKey;
  readonly results: ResultsJson;
  readonly stats: AnalysisStats;
  readonly diagnostics: readonly Diagnostic[];
};

export const sha256FileHex = (path: string): Result<string, string> => {
  try {
    const data = readFileSync(path);
    return {
      ok: true,
      value: createHash("sha256").update(new Uint8Array(data)).digest("hex"),
    };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to read file for hashing: ${path}\n${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

const digestOf = (path: string): Result<FileDigest, string> => {
  const hash = sha256FileHex(path);
  return hash.ok ? { ok: true, value: { path, sha256: hash.value } } : hash;
};

export const createCacheEntry = (
  output: AnalysisOutput,
  key: CacheKey,
  results: ResultsJson,
  stats: AnalysisStats
): Result<CacheEntry, string> => {
  const target = digestOf(output.target);
  if (!target.ok) {
    return target;
  }

  const modules: FileDigest[] = [];
  for (const path of [...output.program.modules.keys()].sort()) {
    if (path === output.target) continue;
    const digest = digestOf(path);
    if (!digest.ok) {
      return digest;
    }
    modules.push(digest.value);
  }

  return {
    ok: true,
    value: {
      version: CACHE_FORMAT_VERSION,
      target: target.value,
      modules,
      config: key,
      results,
      stats,
      diagnostics: output.ledger.records(),
    },
  };
};

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const parseDigest = (value: unknown): FileDigest | undefined =>
  isRecord(value) &&
  typeof value.path === "string" &&
  typeof value.sha256 === "string"
    ? { path: value.path, sha256: value.sha256 }
    : undefined;

const parseKey = (value: unknown): CacheKey | undefined =>
  isRecord(value) &&
  isFiniteNumber(value.followImports) &&
  isStringArray(value.excludeImports) &&
  isStringArray(value.exclude) &&
  typeof value.strict === "boolean" &&
  isStringArray(value.searchPaths)
    ? {
        followImports: value.followImports,
        excludeImports: value.excludeImports,
        exclude: value.exclude,
        strict: value.strict,
        searchPaths: value.searchPaths,
      }
    : undefined;

const parseFunctionResults = (value: unknown): FunctionResults | undefined =>
  isRecord(value) &&
  isStringArray(value.calls) &&
  isStringArray(value.dels) &&
  isStringArray(value.gets) &&
  isStringArray(value.sets)
    ? { calls: value.calls, dels: value.dels, gets: value.gets, sets: value.sets }
    : undefined;

const parseResults = (value: unknown): ResultsJson | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const results: Record<string, FunctionResults> = {};
  for (const [name, entry] of Object.entries(value)) {
    const parsed = parseFunctionResults(entry);
    if (!parsed) {
      return undefined;
    }
    results[name] = parsed;
  }
  return results;
};

/**
 * Badness is infinite once a fatal diagnostic was recorded; JSON has no
 * number for it, so it is stored as a string
 */
const INFINITE_BADNESS = "Infinity";

type StoredBadness = number | typeof INFINITE_BADNESS;

const storeBadness = (badness: number): StoredBadness =>
  Number.isFinite(badness) ? badness : INFINITE_BADNESS;

const parseBadness = (value: unknown): number | undefined =>
  value === INFINITE_BADNESS
    ? Number.POSITIVE_INFINITY
    : isFiniteNumber(value)
      ? value
      : undefined;

const storeStats = (stats: AnalysisStats) => ({
  ...stats,
  targetBadness: storeBadness(stats.targetBadness),
  overallBadness: storeBadness(stats.overallBadness),
});

const parseStats = (value: unknown): AnalysisStats | undefined => {
  if (
    !isRecord(value) ||
    !isFiniteNumber(value.modules) ||
    !isFiniteNumber(value.functions)
  ) {
    return undefined;
  }
  const targetBadness = parseBadness(value.targetBadness);
  const overallBadness = parseBadness(value.overallBadness);
  return targetBadness !== undefined && overallBadness !== undefined
    ? {
        modules: value.modules,
        functions: value.functions,
        targetBadness,
        overallBadness,
      }
    : undefined;
};

const isSeverity = (value: unknown): value is DiagnosticSeverity =>
  value === "info" || value === "warning" || value === "error" || value === "fatal";

const parseLocation = (value: unknown): SourceLocation | undefined =>
  isRecord(value) &&
  typeof value.file === "string" &&
  isFiniteNumber(value.line) &&
  isFiniteNumber(value.column) &&
  isFiniteNumber(value.length)
    ? {
        file: value.file,
        line: value.line,
        column: value.column,
        length: value.length,
      }
    : undefined;

const parseDiagnostic = (value: unknown): Diagnostic | undefined => {
  if (
    !isRecord(value) ||
    typeof value.code !== "string" ||
    !isDiagnosticCode(value.code) ||
    !isSeverity(value.severity) ||
    typeof value.message !== "string"
  ) {
    return undefined;
  }
  const location =
    value.location === undefined ? undefined : parseLocation(value.location);
  if (value.location !== undefined && !location) {
    return undefined;
  }
  return {
    code: value.code,
    severity: value.severity,
    message: value.message,
    location,
    hint: typeof value.hint === "string" ? value.hint : undefined,
  };
};

/**
 * Shape-check a parsed cache file
 */
export const parseCacheEntry = (raw: unknown): CacheEntry | undefined => {
  if (!isRecord(raw) || raw.version !== CACHE_FORMAT_VERSION) {
    return undefined;
  }
  const target = parseDigest(raw.target);
  const config = parseKey(raw.config);
  const results = parseResults(raw.results);
  const stats = parseStats(raw.stats);
  if (
    !target ||
    !config ||
    !results ||
    !stats ||
    !Array.isArray(raw.modules) ||
    !Array.isArray(raw.diagnostics)
  ) {
    return undefined;
  }

  const modules: FileDigest[] = [];
  for (const item of raw.modules) {
    const digest = parseDigest(item);
    if (!digest) {
      return undefined;
    }
    modules.push(digest);
  }

  const diagnostics: Diagnostic[] = [];
  for (const item of raw.diagnostics) {
    const diagnostic = parseDiagnostic(item);
    if (!diagnostic) {
      return undefined;
    }
    diagnostics.push(diagnostic);
  }

  return {
    version: CACHE_FORMAT_VERSION,
    target,
    modules,
    config,
    results,
    stats,
    diagnostics,
  };
};

const sameKey = (a: CacheKey, b: CacheKey): boolean =>
  JSON.stringify(a) === JSON.stringify(b);

const unchanged = (digest: FileDigest): boolean => {
  const current = sha256FileHex(digest.path);
  return current.ok && current.value === digest.sha256;
};

/**
 * The cached entry for `target`, or an error naming why it cannot be reused
 */
export const readCache = (
  cacheFile: string,
  target: string,
  key: CacheKey
): Result<CacheEntry, string> => {
  if (!existsSync(cacheFile)) {
    return { ok: false, error: `No cache at ${cacheFile}` };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(cacheFile, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse cache ${cacheFile}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const entry = parseCacheEntry(raw);
  if (!entry) {
    return { ok: false, error: `Cache ${cacheFile} has an unknown format` };
  }
  if (entry.target.path !== target) {
    return { ok: false, error: `Cache ${cacheFile} belongs to ${entry.target.path}` };
  }
  if (!sameKey(entry.config, key)) {
    return { ok: false, error: "Cached configuration differs" };
  }
  const changed = [entry.target, ...entry.modules].find(
    (digest) => !unchanged(digest)
  );
  if (changed) {
    return { ok: false, error: `${changed.path} changed since it was cached` };
  }
  return { ok: true, value: entry };
};

export const writeCache = (
  cacheFile: string,
  entry: CacheEntry
): Result<void, string> => {
  try {
    mkdirSync(dirname(cacheFile), { recursive: true });
    const stored = { ...entry, stats: storeStats(entry.stats) };
    writeFileSync(cacheFile, `${JSON.stringify(stored, null, 2)}\n`, "utf-8");
    return { ok: true, value: undefined };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to write cache ${cacheFile}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

export const clearCache = (cacheFile: string): void => {
  rmSync(cacheFile, { force: true });
};
