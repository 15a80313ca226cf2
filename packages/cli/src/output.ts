/**
 * Stdout renderings of an analysis: results, raw IR and stats
 */

import {
  sortedNames,
  type AnalysisOutput,
  type FunctionIR,
  type FunctionRecord,
  type ModuleIR,
  type Program,
} from "@attrtrace/analyzer";

export type FunctionResults = {
  readonly calls: readonly string[];
  readonly dels: readonly string[];
  readonly gets: readonly string[];
  readonly sets: readonly string[];
};

/**
 * Finalized results keyed by qualified function name, keys in sorted order
 */
export type ResultsJson = Readonly<Record<string, FunctionResults>>;

export type AnalysisStats = {
  readonly modules: number;
  readonly functions: number;
  readonly targetBadness: number;
  readonly overallBadness: number;
};

const byKey = <T>(entries: readonly (readonly [string, T])[]): Record<string, T> =>
  Object.fromEntries(
    [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );

const calleeNames = (ir: FunctionIR): readonly string[] => [
  ...new Set(ir.calls.map((call) => call.name)),
];

export const functionResults = (ir: FunctionIR): FunctionResults => ({
  calls: calleeNames(ir),
  dels: sortedNames(ir.dels),
  gets: sortedNames(ir.gets),
  sets: sortedNames(ir.sets),
});

export const toResultsJson = (
  results: ReadonlyMap<string, FunctionIR>
): ResultsJson =>
  byKey([...results].map(([name, ir]) => [name, functionResults(ir)] as const));

const recordJson = (record: FunctionRecord) => ({
  kind: record.kind,
  gets: sortedNames(record.ir.gets),
  sets: sortedNames(record.ir.sets),
  dels: sortedNames(record.ir.dels),
  calls: record.ir.calls.map((call) => ({
    name: call.name,
    args: call.args,
    kwargs: byKey(Object.entries(call.kwargs)),
  })),
});

/**
 * Unsimplified IR of every loaded module, call sites with their arguments
 */
export const toIrJson = (
  program: Program
): Record<
  string,
  {
    moduleName: string;
    category: ModuleIR["category"];
    functions: Record<
      string,
      {
        kind: FunctionRecord["kind"];
        gets: readonly string[];
        sets: readonly string[];
        dels: readonly string[];
        calls: {
          name: string;
          args: readonly string[];
          kwargs: Record<string, string>;
        }[];
      }
    >;
  }
> =>
  byKey(
    [...program.modules.values()].map(
      (module) =>
        [
          module.path,
          {
            moduleName: module.moduleName,
            category: module.category,
            functions: byKey(
              [...module.functions].map(
                ([name, record]) => [name, recordJson(record)] as const
              )
            ),
          },
        ] as const
    )
  );

export const collectStats = (output: AnalysisOutput): AnalysisStats => ({
  modules: output.program.modules.size,
  functions: [...output.program.modules.values()].reduce(
    (count, module) => count + module.functions.size,
    0
  ),
  targetBadness: output.ledger.total(output.target),
  overallBadness: output.ledger.overall(),
});

export const formatStats = (
  stats: AnalysisStats,
  elapsedMs: number
): readonly string[] => [
  `Modules loaded:     ${stats.modules}`,
  `Functions analysed: ${stats.functions}`,
  `Target badness:     ${stats.targetBadness}`,
  `Overall badness:    ${stats.overallBadness}`,
  `Elapsed:            ${elapsedMs}ms`,
];

export const toJsonText = (value: unknown): string =>
  JSON.stringify(value, null, 2);
