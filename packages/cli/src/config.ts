/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname, isAbsolute } from "node:path";
import { DEFAULT_PYTHON } from "@attrtrace/analyzer";
import {
  isStdoutMode,
  isWarningLevel,
  type AttrtraceConfig,
  type CliOptions,
  type ResolvedConfig,
  type Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "attrtrace.json";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

type FieldCheck = {
  readonly accepts: (value: unknown) => boolean;
  readonly expected: string;
};

const FIELDS: Readonly<Record<keyof AttrtraceConfig, FieldCheck>> = {
  $schema: { accepts: (v) => typeof v === "string", expected: "a string" },
  followImports: {
    accepts: (v) => v === 0 || v === 1 || v === 2 || v === 3,
    expected: "0, 1, 2 or 3",
  },
  excludeImports: { accepts: isStringArray, expected: "an array of strings" },
  exclude: { accepts: isStringArray, expected: "an array of strings" },
  warningLevel: {
    accepts: isWarningLevel,
    expected: "one of none, local, default, all",
  },
  strict: { accepts: (v) => typeof v === "boolean", expected: "a boolean" },
  threshold: {
    accepts: (v) => typeof v === "number" && Number.isInteger(v) && v >= 0,
    expected: "a non-negative integer",
  },
  stdout: {
    accepts: isStdoutMode,
    expected: "one of silent, ir, results, stats",
  },
  searchPaths: { accepts: isStringArray, expected: "an array of strings" },
  python: {
    accepts: (v) => typeof v === "string" && v !== "",
    expected: "a non-empty string",
  },
  collapseHome: { accepts: (v) => typeof v === "boolean", expected: "a boolean" },
  truncateDeepPaths: {
    accepts: (v) => typeof v === "boolean",
    expected: "a boolean",
  },
  cacheFile: { accepts: (v) => typeof v === "string", expected: "a string" },
};

const isConfigKey = (key: string): key is keyof AttrtraceConfig =>
  Object.prototype.hasOwnProperty.call(FIELDS, key);

/**
 * Check a parsed attrtrace.json field by field
 */
export const validateConfig = (
  raw: unknown
): Result<AttrtraceConfig, string> => {
  if (!isRecord(raw)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) {
      return { ok: false, error: `${CONFIG_FILE_NAME}: unknown key '${key}'` };
    }
    const check = FIELDS[key];
    if (!check.accepts(value)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: '${key}' must be ${check.expected}`,
      };
    }
  }

  if (raw.strict === true && typeof raw.threshold === "number" && raw.threshold > 0) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'strict' and 'threshold' are mutually exclusive`,
    };
  }

  const config: AttrtraceConfig = {
    $schema: typeof raw.$schema === "string" ? raw.$schema : undefined,
    followImports:
      typeof raw.followImports === "number" ? raw.followImports : undefined,
    excludeImports: isStringArray(raw.excludeImports)
      ? raw.excludeImports
      : undefined,
    exclude: isStringArray(raw.exclude) ? raw.exclude : undefined,
    warningLevel: isWarningLevel(raw.warningLevel) ? raw.warningLevel : undefined,
    strict: typeof raw.strict === "boolean" ? raw.strict : undefined,
    threshold: typeof raw.threshold === "number" ? raw.threshold : undefined,
    stdout: isStdoutMode(raw.stdout) ? raw.stdout : undefined,
    searchPaths: isStringArray(raw.searchPaths) ? raw.searchPaths : undefined,
    python: typeof raw.python === "string" ? raw.python : undefined,
    collapseHome:
      typeof raw.collapseHome === "boolean" ? raw.collapseHome : undefined,
    truncateDeepPaths:
      typeof raw.truncateDeepPaths === "boolean"
        ? raw.truncateDeepPaths
        : undefined,
    cacheFile: typeof raw.cacheFile === "string" ? raw.cacheFile : undefined,
  };
  return { ok: true, value: config };
};

/**
 * Load attrtrace.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<AttrtraceConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return validateConfig(raw);
};

/**
 * Find attrtrace.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find attrtrace.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const under = (root: string, path: string): string =>
  isAbsolute(path) ? path : resolve(root, path);

/**
 * Resolve final configuration from file + CLI args.
 *
 * Paths in the file are relative to `projectRoot` (the directory holding
 * attrtrace.json); paths on the command line and the target are relative
 * to `cwd`. `--strict` and `--threshold` each displace the other's file
 * value.
 */
export const resolveConfig = (
  config: AttrtraceConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  cwd: string,
  entryFile: string
): ResolvedConfig => {
  const cliPicksMode =
    cliOptions.strict !== undefined || cliOptions.threshold !== undefined;
  const strict = cliPicksMode
    ? (cliOptions.strict ?? false)
    : (config.strict ?? false);
  const threshold = cliPicksMode
    ? (cliOptions.threshold ?? 0)
    : (config.threshold ?? 0);

  const cacheFile =
    cliOptions.cacheFile !== undefined
      ? under(cwd, cliOptions.cacheFile)
      : config.cacheFile !== undefined
        ? under(projectRoot, config.cacheFile)
        : undefined;

  return {
    target: under(cwd, entryFile),
    projectRoot,
    followImports: cliOptions.followImports ?? config.followImports ?? 1,
    excludeImports: [
      ...(config.excludeImports ?? []),
      ...(cliOptions.excludeImports ?? []),
    ],
    exclude: [...(config.exclude ?? []), ...(cliOptions.exclude ?? [])],
    warningLevel: cliOptions.warningLevel ?? config.warningLevel ?? "default",
    strict,
    threshold,
    stdout: cliOptions.stdout ?? config.stdout ?? "results",
    searchPaths: [
      ...(cliOptions.searchPaths ?? []).map((path) => under(cwd, path)),
      ...(config.searchPaths ?? []).map((path) => under(projectRoot, path)),
    ],
    python: cliOptions.python ?? config.python ?? DEFAULT_PYTHON,
    collapseHome: cliOptions.collapseHome ?? config.collapseHome ?? false,
    truncateDeepPaths:
      cliOptions.truncateDeepPaths ?? config.truncateDeepPaths ?? false,
    cacheFile,
    forceRefreshCache: cliOptions.forceRefreshCache ?? false,
    verbose: cliOptions.verbose ?? false,
  };
};
