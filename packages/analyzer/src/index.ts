/**
 * @attrtrace/analyzer - static gets/sets/dels/calls analysis of Python
 */

export {
  createAnalyzer,
  type Analyzer,
  type AnalyzerOptions,
  type AnalysisFailure,
  type AnalysisOutput,
} from "./analyze.js";
export {
  RUN_SCOPE,
  FileAnalysisAborted,
  createSeverityLedger,
  severityWeight,
  type DiagnosticsSink,
  type SeverityLedger,
} from "./ledger/ledger.js";
export {
  loadProgram,
  type CachedModule,
  type ModuleCache,
} from "./loader/loader.js";
export {
  DEFAULT_PYTHON,
  interpreterSearchPaths,
  parseSysPath,
  runInterpreter,
  type InterpreterRunner,
} from "./loader/interpreter.js";
export { createInMemoryProvider } from "./loader/memory-provider.js";
export {
  createFileSystemProvider,
  type ModuleLocation,
  type ModuleSourceProvider,
} from "./loader/provider.js";
export { formatName, type FormattedName } from "./naming/format.js";
export { IGNORE_DECORATOR, RESULTS_DECORATOR } from "./overrides/decide.js";
export { simplifyProgram, targetResults } from "./simplifier/simplify.js";
export { createPythonParser, type PythonParser } from "./syntax/parser.js";
export {
  DEFAULT_MAX_ITERATIONS,
  createConfig,
  type AnalyzerConfig,
  type ConfigInput,
  type FollowImportsLevel,
} from "./types/config.js";
export {
  DIAGNOSTIC_CODES,
  createDiagnostic,
  formatDiagnostic,
  isDiagnosticCode,
  isErrorOrWorse,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticSeverity,
  type SourceLocation,
} from "./types/diagnostic.js";
export {
  sortedNames,
  type CallSite,
  type CallTarget,
  type FunctionIR,
  type FunctionRecord,
  type ModuleIR,
  type Program,
} from "./types/ir.js";
export { error, ok, type Result } from "./types/result.js";
