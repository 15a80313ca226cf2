/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { performance } from "node:perf_hooks";
import {
  createAnalyzer,
  createConfig,
  formatDiagnostic,
  interpreterSearchPaths,
  type AnalyzerConfig,
  type DiagnosticsSink,
} from "@attrtrace/analyzer";
import {
  clearCache,
  createCacheEntry,
  readCache,
  writeCache,
  type CacheKey,
} from "../cache.js";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import {
  collectStats,
  formatStats,
  toIrJson,
  toJsonText,
  toResultsJson,
  type AnalysisStats,
  type ResultsJson,
} from "../output.js";
import { createPathFormatter, type PathFormatter } from "../paths.js";
import { createConsoleSink } from "../sink.js";
import type { AttrtraceConfig, ResolvedConfig, Result } from "../types.js";
import {
  EXIT_CONFIG,
  EXIT_FAILED,
  EXIT_OK,
  EXIT_USAGE,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Pass/fail of a finished analysis against --strict or --threshold
 */
export const exitCodeFor = (
  targetBadness: number,
  config: Pick<ResolvedConfig, "strict" | "threshold">
): number => {
  if (config.strict) {
    return targetBadness > 0 ? EXIT_FAILED : EXIT_OK;
  }
  if (config.threshold > 0) {
    return targetBadness > config.threshold ? EXIT_FAILED : EXIT_OK;
  }
  return EXIT_OK;
};

const cacheKeyOf = (config: ResolvedConfig): CacheKey => ({
  followImports: config.followImports,
  excludeImports: config.excludeImports,
  exclude: config.exclude,
  strict: config.strict,
  searchPaths: config.searchPaths,
});

const loadFileConfig = (
  cwd: string,
  explicitPath: string | undefined
): Result<{ config: AttrtraceConfig; projectRoot: string }, string> => {
  const configPath =
    explicitPath !== undefined ? resolve(cwd, explicitPath) : findConfig(cwd);

  // A project without attrtrace.json runs on defaults
  if (configPath === null) {
    return { ok: true, value: { config: {}, projectRoot: cwd } };
  }

  const loaded = loadConfig(configPath);
  return loaded.ok
    ? { ok: true, value: { config: loaded.value, projectRoot: dirname(configPath) } }
    : loaded;
};

/**
 * Manual search paths followed by the interpreter's sys.path, which is
 * only queried when installed packages or the standard library are followed
 */
const withInterpreterPaths = (config: ResolvedConfig): ResolvedConfig => {
  if (config.followImports < 2) {
    return config;
  }

  const discovered = interpreterSearchPaths(config.python);
  if (!discovered.ok) {
    console.error(`Warning: Unable to read sys.path: ${discovered.error}`);
    return config;
  }

  if (config.verbose) {
    console.error(
      `Searching ${discovered.value.length} sys.path entries of ${config.python}`
    );
  }
  return {
    ...config,
    searchPaths: [
      ...config.searchPaths,
      ...discovered.value.filter((path) => !config.searchPaths.includes(path)),
    ],
  };
};

const writeOutput = (
  config: ResolvedConfig,
  results: ResultsJson,
  stats: AnalysisStats,
  elapsedMs: number
): void => {
  switch (config.stdout) {
    case "results":
      console.log(toJsonText(results));
      return;
    case "stats":
      for (const line of formatStats(stats, elapsedMs)) {
        console.log(line);
      }
      return;
    case "ir":
    case "silent":
      return;
  }
};

const useCache = (
  config: ResolvedConfig,
  cacheFile: string,
  sink: DiagnosticsSink,
  formatPath: PathFormatter,
  started: number
): number | undefined => {
  const cached = readCache(cacheFile, config.target, cacheKeyOf(config));
  if (!cached.ok) {
    if (config.verbose) {
      console.error(`Cache not used: ${cached.error}`);
    }
    return undefined;
  }

  if (config.verbose) {
    console.error(`Using cached results from ${formatPath(cacheFile)}`);
  }
  for (const diagnostic of cached.value.diagnostics) {
    sink(diagnostic);
  }
  writeOutput(
    config,
    cached.value.results,
    cached.value.stats,
    Math.round(performance.now() - started)
  );
  return exitCodeFor(cached.value.stats.targetBadness, config);
};

const analyze = async (
  config: ResolvedConfig,
  analyzerConfig: AnalyzerConfig
): Promise<number> => {
  const started = performance.now();
  const formatPath = createPathFormatter(config);
  const sink = createConsoleSink({
    warningLevel: config.warningLevel,
    target: config.target,
    formatPath,
  });

  // Raw IR is never cached
  const cacheFile = config.stdout === "ir" ? undefined : config.cacheFile;
  if (cacheFile !== undefined) {
    if (config.forceRefreshCache) {
      clearCache(cacheFile);
    } else {
      const code = useCache(config, cacheFile, sink, formatPath, started);
      if (code !== undefined) {
        return code;
      }
    }
  }

  const analyzer = await createAnalyzer(analyzerConfig, { sink });
  if (!analyzer.ok) {
    console.error(formatDiagnostic(analyzer.error, formatPath));
    return EXIT_FAILED;
  }

  if (config.verbose) {
    console.error(`Analysing ${formatPath(config.target)}`);
  }
  const analysis = analyzer.value.analyzeFile(config.target);
  if (!analysis.ok) {
    const { diagnostic, ledger } = analysis.error;
    // Fatal records already went through the sink
    if (!ledger.records().includes(diagnostic)) {
      console.error(formatDiagnostic(diagnostic, formatPath));
    }
    return EXIT_FAILED;
  }

  const output = analysis.value;
  const results = toResultsJson(output.results);
  const stats = collectStats(output);
  const elapsedMs = Math.round(performance.now() - started);
  if (config.verbose) {
    console.error(
      `Loaded ${stats.modules} module(s), analysed ${stats.functions} function(s) in ${elapsedMs}ms`
    );
  }

  if (config.stdout === "ir") {
    console.log(toJsonText(toIrJson(output.program)));
  } else {
    writeOutput(config, results, stats, elapsedMs);
  }

  if (cacheFile !== undefined) {
    const entry = createCacheEntry(output, cacheKeyOf(config), results, stats);
    const written = entry.ok ? writeCache(cacheFile, entry.value) : entry;
    if (!written.ok) {
      console.error(`Warning: ${written.error}`);
    }
  }

  return exitCodeFor(stats.targetBadness, config);
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`attrtrace v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help") {
    showHelp();
    return EXIT_OK;
  }

  if (parsed.errors.length > 0 || parsed.entryFile === undefined) {
    for (const message of parsed.errors) {
      console.error(`Error: ${message}`);
    }
    console.error("Run 'attrtrace --help' for usage");
    return EXIT_USAGE;
  }

  const fileConfig = loadFileConfig(cwd, parsed.options.config);
  if (!fileConfig.ok) {
    console.error(`Error: ${fileConfig.error}`);
    return EXIT_CONFIG;
  }

  const config = withInterpreterPaths(
    resolveConfig(
      fileConfig.value.config,
      parsed.options,
      fileConfig.value.projectRoot,
      cwd,
      parsed.entryFile
    )
  );

  const analyzerConfig = createConfig({
    followImports: config.followImports,
    excludeImports: config.excludeImports,
    excludeNames: config.exclude,
    strict: config.strict,
    threshold: config.threshold,
    searchPaths: config.searchPaths,
  });
  if (!analyzerConfig.ok) {
    console.error(`Error: ${analyzerConfig.error.message}`);
    return EXIT_CONFIG;
  }

  return analyze(config, analyzerConfig.value);
};
