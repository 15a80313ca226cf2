/**
 * Call simplifier
 *
 * Folds every resolvable callee's effects into its callers, rebased onto
 * the actual arguments. Callees are finalized in reverse topological order
 * of the call graph; a recursive component is iterated to a fixed point
 * under an iteration cap.
 */

import { LOCAL_VALUE_PREFIX } from "../naming/names.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import {
  functionIRsEqual,
  mergeEffects,
  type CallSite,
  type FunctionIR,
  type FunctionRecord,
  type ModuleIR,
  type Program,
} from "../types/ir.js";
import { bindArguments } from "./binding.js";
import { stronglyConnectedComponents } from "./graph.js";
import { substituteEffects, type Effects } from "./substitute.js";
import {
  functionKey,
  resolveCallTarget,
  type ResolvedCallee,
} from "./targets.js";

export type SimplifyOptions = {
  readonly maxIterations: number;
  readonly report: (diagnostic: Diagnostic) => void;
};

type Node = {
  readonly key: string;
  readonly module: ModuleIR;
  readonly record: FunctionRecord;
};

/**
 * A resolved call edge with its argument binding computed once
 */
type Edge = {
  readonly callee: ResolvedCallee;
  readonly mapping: ReadonlyMap<string, string>;
};

const classNameOf = (qualifiedName: string): string => {
  const end = qualifiedName.lastIndexOf(".");
  return end === -1 ? qualifiedName : qualifiedName.slice(0, end);
};

/**
 * Actual positional arguments, with the implicit first argument of an
 * initialiser or classmethod prepended
 */
const actualArguments = (
  call: CallSite,
  callee: FunctionRecord,
  report: (diagnostic: Diagnostic) => void
): readonly string[] => {
  switch (callee.kind) {
    case "class": {
      if (call.receiver !== undefined) {
        return [call.receiver, ...call.args];
      }
      report(
        createDiagnostic(
          "ATR3002",
          "warning",
          `class '${callee.qualifiedName}' initialised but not stored`,
          call.location
        )
      );
      return [`${LOCAL_VALUE_PREFIX}${callee.qualifiedName}`, ...call.args];
    }
    case "classmethod":
      return [classNameOf(callee.qualifiedName), ...call.args];
    default:
      return call.args;
  }
};

const edgesOf = (
  program: Program,
  node: Node,
  report: (diagnostic: Diagnostic) => void
): readonly Edge[] => {
  const edges: Edge[] = [];
  for (const call of node.record.ir.calls) {
    const callee = resolveCallTarget(program, call.target);
    if (!callee) {
      if (call.target.kind === "function" || call.target.kind === "import") {
        report(
          createDiagnostic(
            "ATR5003",
            "info",
            `call to '${call.name}' has no analysed body, treated as opaque`,
            call.location
          )
        );
      }
      continue;
    }

    const args = actualArguments(call, callee.record, report);
    const binding = bindArguments(callee.record.interface, args, call.kwargs);
    for (const problem of binding.problems) {
      report(
        createDiagnostic(
          "ATR5001",
          problem.severity === "error" ? "warning" : "info",
          `call '${call.name}' in '${node.record.qualifiedName}': ${problem.message}`,
          call.location
        )
      );
    }
    edges.push({ callee, mapping: binding.mapping });
  }
  return edges;
};

/**
 * Own effects plus the substituted effects of every edge whose callee has
 * an IR in `known`
 */
const combine = (
  own: FunctionIR,
  edges: readonly Edge[],
  known: (key: string) => FunctionIR | undefined
): FunctionIR => {
  const substituted: Effects[] = [];
  for (const edge of edges) {
    const calleeIR = known(edge.callee.key);
    if (calleeIR) {
      substituted.push(
        substituteEffects(calleeIR, edge.callee.record.interface, edge.mapping)
      );
    }
  }
  return mergeEffects(own, ...substituted);
};

export const simplifyProgram = (
  program: Program,
  options: SimplifyOptions
): Program => {
  const nodes = new Map<string, Node>();
  for (const module of program.modules.values()) {
    for (const record of module.functions.values()) {
      const key = functionKey(module.path, record.qualifiedName);
      nodes.set(key, { key, module, record });
    }
  }

  const edges = new Map<string, readonly Edge[]>();
  for (const node of nodes.values()) {
    edges.set(node.key, edgesOf(program, node, options.report));
  }

  const edgesFrom = (key: string): readonly Edge[] => edges.get(key) ?? [];
  const finals = new Map<string, FunctionIR>();

  const components = stronglyConnectedComponents([...nodes.keys()], (key) =>
    edgesFrom(key).map((edge) => edge.callee.key)
  );

  for (const component of components) {
    const members = new Set(component);
    const recursive =
      component.length > 1 ||
      component.some((key) =>
        edgesFrom(key).some((edge) => edge.callee.key === key)
      );

    const ownOf = (key: string): FunctionIR | undefined => nodes.get(key)?.record.ir;

    if (!recursive) {
      for (const key of component) {
        const own = ownOf(key);
        if (own) {
          finals.set(key, combine(own, edgesFrom(key), (callee) => finals.get(callee)));
        }
      }
      continue;
    }

    let current = new Map<string, FunctionIR>();
    for (const key of component) {
      const own = ownOf(key);
      if (own) {
        current.set(key, own);
      }
    }

    let converged = false;
    for (let iteration = 0; iteration < options.maxIterations; iteration++) {
      const previous = current;
      const lookup = (callee: string): FunctionIR | undefined =>
        members.has(callee) ? previous.get(callee) : finals.get(callee);

      current = new Map();
      for (const key of component) {
        const own = ownOf(key);
        if (own) {
          current.set(key, combine(own, edgesFrom(key), lookup));
        }
      }

      converged = component.every((key) => {
        const before = previous.get(key);
        const after = current.get(key);
        return before !== undefined && after !== undefined && functionIRsEqual(before, after);
      });
      if (converged) {
        break;
      }
    }

    if (!converged) {
      // Degrade: calls within the component become opaque
      for (const key of component) {
        const node = nodes.get(key);
        if (!node) {
          continue;
        }
        options.report(
          createDiagnostic(
            "ATR5002",
            "warning",
            `recursive call effects of '${node.record.qualifiedName}' did not converge within ${options.maxIterations} iterations`,
            node.record.location
          )
        );
        current.set(
          key,
          combine(node.record.ir, edgesFrom(key), (callee) =>
            members.has(callee) ? undefined : finals.get(callee)
          )
        );
      }
    }

    current.forEach((ir, key) => finals.set(key, ir));
  }

  const modules = new Map<string, ModuleIR>();
  for (const [path, module] of program.modules) {
    const functions = new Map<string, FunctionRecord>();
    for (const [name, record] of module.functions) {
      const ir = finals.get(functionKey(path, name)) ?? record.ir;
      functions.set(name, { ...record, ir });
    }
    modules.set(path, { ...module, functions });
  }

  return { ...program, modules };
};

/**
 * Finalized results of the target module's functions
 */
export const targetResults = (program: Program): ReadonlyMap<string, FunctionIR> => {
  const target = program.modules.get(program.target);
  const results = new Map<string, FunctionIR>();
  target?.functions.forEach((record, name) => results.set(name, record.ir));
  return results;
};
