/**
 * Type definitions for CLI
 */

export type { Result } from "@attrtrace/analyzer";

/**
 * Which warnings reach stderr
 */
export type WarningLevel = "none" | "local" | "default" | "all";

/**
 * What is written to stdout once the target has been analysed
 */
export type StdoutMode = "silent" | "ir" | "results" | "stats";

/**
 * Configuration file (attrtrace.json)
 */
export type AttrtraceConfig = {
  readonly $schema?: string;
  readonly followImports?: number;
  readonly excludeImports?: readonly string[];
  readonly exclude?: readonly string[];
  readonly warningLevel?: WarningLevel;
  readonly strict?: boolean;
  readonly threshold?: number;
  readonly stdout?: StdoutMode;
  readonly searchPaths?: readonly string[];
  readonly python?: string;
  readonly collapseHome?: boolean;
  readonly truncateDeepPaths?: boolean;
  readonly cacheFile?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  config?: string;
  followImports?: number;
  excludeImports?: string[];
  exclude?: string[];
  warningLevel?: WarningLevel;
  collapseHome?: boolean;
  truncateDeepPaths?: boolean;
  strict?: boolean;
  threshold?: number;
  stdout?: StdoutMode;
  searchPaths?: string[];
  python?: string;
  cacheFile?: string;
  forceRefreshCache?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  /** Absolute path of the file to analyse */
  readonly target: string;
  readonly projectRoot: string;
  readonly followImports: number;
  readonly excludeImports: readonly string[];
  readonly exclude: readonly string[];
  readonly warningLevel: WarningLevel;
  readonly strict: boolean;
  readonly threshold: number;
  readonly stdout: StdoutMode;
  /** Manual search paths, searched before the interpreter's sys.path */
  readonly searchPaths: readonly string[];
  /** Interpreter queried for sys.path at follow-imports level 2 and above */
  readonly python: string;
  readonly collapseHome: boolean;
  readonly truncateDeepPaths: boolean;
  readonly cacheFile: string | undefined;
  readonly forceRefreshCache: boolean;
  readonly verbose: boolean;
};

export const WARNING_LEVELS: readonly WarningLevel[] = [
  "none",
  "local",
  "default",
  "all",
];

export const STDOUT_MODES: readonly StdoutMode[] = [
  "silent",
  "ir",
  "results",
  "stats",
];

export const isWarningLevel = (value: unknown): value is WarningLevel =>
  WARNING_LEVELS.some((level) => level === value);

export const isStdoutMode = (value: unknown): value is StdoutMode =>
  STDOUT_MODES.some((mode) => mode === value);
