/**
 * Analysis entry point: load, visit and simplify one target file
 */

import {
  FileAnalysisAborted,
  createSeverityLedger,
  type DiagnosticsSink,
  type SeverityLedger,
} from "./ledger/ledger.js";
import { loadProgram, type ModuleCache } from "./loader/loader.js";
import {
  createFileSystemProvider,
  type ModuleSourceProvider,
} from "./loader/provider.js";
import { simplifyProgram, targetResults } from "./simplifier/simplify.js";
import { createPythonParser, type PythonParser } from "./syntax/parser.js";
import type { AnalyzerConfig } from "./types/config.js";
import {
  createDiagnostic,
  fileLocation,
  type Diagnostic,
} from "./types/diagnostic.js";
import type { FunctionIR, Program } from "./types/ir.js";
import { error, ok, type Result } from "./types/result.js";

export type AnalysisOutput = {
  readonly target: string;
  /** Finalized IR per function of the target file */
  readonly results: ReadonlyMap<string, FunctionIR>;
  /** Raw IR of every loaded module */
  readonly program: Program;
  readonly simplified: Program;
  readonly ledger: SeverityLedger;
};

/**
 * The target file could not be analysed; `diagnostic` is the fatal record
 */
export type AnalysisFailure = {
  readonly target: string;
  readonly diagnostic: Diagnostic;
  readonly ledger: SeverityLedger;
};

export type AnalyzerOptions = {
  readonly sink?: DiagnosticsSink;
  /** Already-loaded parser; the grammar is loaded from config otherwise */
  readonly parser?: PythonParser;
  readonly provider?: ModuleSourceProvider;
  readonly cache?: ModuleCache;
};

export type Analyzer = {
  readonly config: AnalyzerConfig;
  readonly analyzeFile: (
    path: string
  ) => Result<AnalysisOutput, AnalysisFailure>;
};

/**
 * Each call gets its own Context and Severity Ledger; only the parser,
 * the provider and the optional module cache are shared.
 */
const analyzeWith = (
  parser: PythonParser,
  provider: ModuleSourceProvider,
  config: AnalyzerConfig,
  options: AnalyzerOptions,
  path: string
): Result<AnalysisOutput, AnalysisFailure> => {
  const ledger = createSeverityLedger({
    strict: config.strict,
    sink: options.sink,
  });

  try {
    const program = loadProgram(path, {
      parser,
      provider,
      config,
      ledger,
      cache: options.cache,
    });
    const simplified = simplifyProgram(program, {
      maxIterations: config.maxIterations,
      report: ledger.record,
    });
    return ok({
      target: program.target,
      results: targetResults(simplified),
      program,
      simplified,
      ledger,
    });
  } catch (e) {
    if (e instanceof FileAnalysisAborted) {
      return error({ target: path, diagnostic: e.diagnostic, ledger });
    }
    const message = e instanceof Error ? e.message : String(e);
    return error({
      target: path,
      diagnostic: createDiagnostic(
        "ATR6001",
        "fatal",
        `Internal error: ${message}`,
        fileLocation(path)
      ),
      ledger,
    });
  }
};

export const createAnalyzer = async (
  config: AnalyzerConfig,
  options: AnalyzerOptions = {}
): Promise<Result<Analyzer, Diagnostic>> => {
  const parser: Result<PythonParser, string> = options.parser
    ? ok(options.parser)
    : await createPythonParser(config.grammarPath);
  if (!parser.ok) {
    return error(createDiagnostic("ATR9001", "error", parser.error));
  }
  const provider = options.provider ?? createFileSystemProvider(config.searchPaths);

  return ok({
    config,
    analyzeFile: (path) =>
      analyzeWith(parser.value, provider, config, options, path),
  });
};
