/**
 * CLI argument parser
 */

import {
  isStdoutMode,
  isWarningLevel,
  type CliOptions,
} from "../types.js";

export type ParsedArgs = {
  command: "analyze" | "help" | "version";
  entryFile?: string;
  options: CliOptions;
  /** Usage errors; the dispatcher exits with code 2 when any are present */
  errors: string[];
};

const parseFollowImports = (value: string): number | undefined =>
  /^[0-3]$/.test(value) ? Number(value) : undefined;

const parseThreshold = (value: string): number | undefined =>
  /^\d+$/.test(value) ? Number(value) : undefined;

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  const errors: string[] = [];
  let entryFile: string | undefined;

  // Value of the option at args[i], or an error when it is missing
  const valueFor = (flag: string, i: number): string | undefined => {
    const value = args[i];
    if (value === undefined || value === "") {
      errors.push(`Option ${flag} requires a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!arg.startsWith("-")) {
      if (entryFile === undefined) {
        entryFile = arg;
      } else {
        errors.push(`Unexpected argument: ${arg}`);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, errors: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, errors: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-c":
      case "--config":
        options.config = valueFor(arg, ++i);
        break;
      case "-f":
      case "--follow-imports":
        {
          const value = valueFor(arg, ++i);
          if (value !== undefined) {
            const level = parseFollowImports(value);
            if (level === undefined) {
              errors.push(`Follow-imports level must be 0, 1, 2 or 3 (got ${value})`);
            }
            options.followImports = level;
          }
        }
        break;
      case "-F":
      case "--exclude-import":
        {
          const pattern = valueFor(arg, ++i);
          if (pattern !== undefined) {
            options.excludeImports = options.excludeImports ?? [];
            options.excludeImports.push(pattern);
          }
        }
        break;
      case "-x":
      case "--exclude":
        {
          const pattern = valueFor(arg, ++i);
          if (pattern !== undefined) {
            options.exclude = options.exclude ?? [];
            options.exclude.push(pattern);
          }
        }
        break;
      case "-w":
      case "--warning-level":
        {
          const value = valueFor(arg, ++i);
          if (isWarningLevel(value)) {
            options.warningLevel = value;
          } else if (value !== undefined) {
            errors.push(
              `Warning level must be none, local, default or all (got ${value})`
            );
          }
        }
        break;
      case "-H":
      case "--collapse-home":
        options.collapseHome = true;
        break;
      case "-T":
      case "--truncate-deep-paths":
        options.truncateDeepPaths = true;
        break;
      case "--strict":
        options.strict = true;
        break;
      case "--threshold":
        {
          const value = valueFor(arg, ++i);
          if (value !== undefined) {
            const threshold = parseThreshold(value);
            if (threshold === undefined) {
              errors.push(`Threshold must be a non-negative integer (got ${value})`);
            }
            options.threshold = threshold;
          }
        }
        break;
      case "-o":
      case "--stdout":
        {
          const value = valueFor(arg, ++i);
          if (isStdoutMode(value)) {
            options.stdout = value;
          } else if (value !== undefined) {
            errors.push(
              `Output mode must be silent, ir, results or stats (got ${value})`
            );
          }
        }
        break;
      case "-S":
      case "--search-path":
        {
          const path = valueFor(arg, ++i);
          if (path !== undefined) {
            options.searchPaths = options.searchPaths ?? [];
            options.searchPaths.push(path);
          }
        }
        break;
      case "-P":
      case "--python":
        options.python = valueFor(arg, ++i);
        break;
      case "-C":
      case "--cache-file":
        options.cacheFile = valueFor(arg, ++i);
        break;
      case "-r":
      case "--force-refresh-cache":
        options.forceRefreshCache = true;
        break;
      default:
        errors.push(`Unknown option: ${arg}`);
    }
  }

  if (options.strict && options.threshold !== undefined) {
    errors.push("Options --strict and --threshold are mutually exclusive");
  }
  if (entryFile === undefined) {
    errors.push("A file to analyse is required");
  }

  return { command: "analyze", entryFile, options, errors };
};
