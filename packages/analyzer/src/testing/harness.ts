/**
 * Test harness: analyse in-memory Python sources
 */

import {
  createAnalyzer,
  type AnalysisFailure,
  type AnalysisOutput,
} from "../analyze.js";
import { createInMemoryProvider } from "../loader/memory-provider.js";
import { createConfig, type ConfigInput } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { sortedNames, type FunctionIR } from "../types/ir.js";
import type { Result } from "../types/result.js";
import {
  createPythonParser,
  type PythonParser,
  type SyntaxNode,
} from "../syntax/parser.js";

export const PROJECT = "/project";
export const TARGET = `${PROJECT}/main.py`;

export type Analysed = {
  readonly output: Result<AnalysisOutput, AnalysisFailure>;
  readonly diagnostics: readonly Diagnostic[];
};

let sharedParser: Promise<PythonParser> | undefined;

/**
 * One grammar load per test run
 */
export const testParser = (): Promise<PythonParser> => {
  if (!sharedParser) {
    sharedParser = createPythonParser().then((parser) => {
      if (!parser.ok) {
        throw new Error(parser.error);
      }
      return parser.value;
    });
  }
  return sharedParser;
};

/**
 * Root node of a parsed source; the tree is kept for the test's lifetime
 */
export const parseModule = async (source: string): Promise<SyntaxNode> =>
  (await testParser()).parse(source).rootNode;

/**
 * First expression of a one-line source such as `a.b[c]`
 */
export const parseExpression = async (source: string): Promise<SyntaxNode> => {
  const statement = (await parseModule(`${source}\n`)).namedChildren[0];
  const expression = statement?.namedChildren[0];
  if (!expression) {
    throw new Error(`no expression in '${source}'`);
  }
  return expression;
};

/**
 * Analyse `main.py` from a set of files under /project. Keys are paths
 * relative to /project.
 */
export const analyseFiles = async (
  files: Readonly<Record<string, string>>,
  input: ConfigInput = {}
): Promise<Analysed> => {
  const config = createConfig(input);
  if (!config.ok) {
    throw new Error(config.error.message);
  }
  const diagnostics: Diagnostic[] = [];
  // Absolute keys stand for files outside the project, such as an
  // interpreter's library directories
  const provider = createInMemoryProvider(
    Object.fromEntries(
      Object.entries(files).map(([path, source]) => [
        path.startsWith("/") ? path : `${PROJECT}/${path}`,
        source,
      ])
    ),
    config.value.searchPaths
  );
  const analyzer = await createAnalyzer(config.value, {
    parser: await testParser(),
    provider,
    sink: (diagnostic) => diagnostics.push(diagnostic),
  });
  if (!analyzer.ok) {
    throw new Error(analyzer.error.message);
  }
  return { output: analyzer.value.analyzeFile(TARGET), diagnostics };
};

export const analyseSource = (
  source: string,
  input: ConfigInput = {}
): Promise<Analysed> => analyseFiles({ "main.py": source }, input);

/**
 * Results of a successful analysis; throws with the fatal message otherwise
 */
export const resultsOf = (analysed: Analysed): ReadonlyMap<string, FunctionIR> => {
  if (!analysed.output.ok) {
    throw new Error(analysed.output.error.diagnostic.message);
  }
  return analysed.output.value.results;
};

export type PlainIR = {
  readonly gets: readonly string[];
  readonly sets: readonly string[];
  readonly dels: readonly string[];
  readonly calls: readonly string[];
};

export const plain = (ir: FunctionIR | undefined): PlainIR | undefined =>
  ir && {
    gets: sortedNames(ir.gets),
    sets: sortedNames(ir.sets),
    dels: sortedNames(ir.dels),
    calls: ir.calls.map((call) => call.name),
  };

export const resultFor = async (
  source: string,
  name: string,
  input: ConfigInput = {}
): Promise<PlainIR | undefined> =>
  plain(resultsOf(await analyseSource(source, input)).get(name));

export const codesOf = (diagnostics: readonly Diagnostic[]): readonly string[] =>
  diagnostics.map((diagnostic) => diagnostic.code);

/**
 * Python source from indented template lines
 */
export const py = (...lines: readonly string[]): string => `${lines.join("\n")}\n`;
