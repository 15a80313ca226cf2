/**
 * Function and module IR produced by the analyzer
 */

import type { ContextSymbol } from "../context/symbols.js";
import type { SourceLocation } from "./diagnostic.js";

/**
 * Formal parameters of a callable, in declaration order.
 *
 * `defaults` maps a parameter to the canonical name of its default value.
 */
export type CallInterface = {
  readonly posonlyargs: readonly string[];
  readonly args: readonly string[];
  readonly vararg?: string;
  readonly kwonlyargs: readonly string[];
  readonly kwarg?: string;
  readonly defaults: Readonly<Record<string, string>>;
};

export const emptyInterface: CallInterface = {
  posonlyargs: [],
  args: [],
  kwonlyargs: [],
  defaults: {},
};

export const parameterNames = (iface: CallInterface): readonly string[] => [
  ...iface.posonlyargs,
  ...iface.args,
  ...(iface.vararg !== undefined ? [iface.vararg] : []),
  ...iface.kwonlyargs,
  ...(iface.kwarg !== undefined ? [iface.kwarg] : []),
];

/**
 * Callee of a call site as the Context saw it at visitation time
 */
export type CallTarget =
  | {
      readonly kind: "function";
      readonly module: string;
      readonly qualifiedName: string;
    }
  | {
      readonly kind: "class";
      readonly module: string;
      readonly qualifiedName: string;
    }
  | {
      readonly kind: "import";
      readonly moduleName: string;
      readonly member: string | undefined;
    }
  | { readonly kind: "builtin"; readonly name: string }
  | { readonly kind: "local"; readonly name: string }
  | { readonly kind: "closure"; readonly name: string }
  | { readonly kind: "method"; readonly name: string }
  | { readonly kind: "unresolved"; readonly name: string };

/**
 * `receiver` is the name a call's result is bound to (`x = C()` gives "x"),
 * passed as `self` when the callee turns out to be a class.
 */
export type CallSite = {
  readonly name: string;
  readonly args: readonly string[];
  readonly kwargs: Readonly<Record<string, string>>;
  readonly target: CallTarget;
  readonly receiver?: string;
  readonly location?: SourceLocation;
};

export type FunctionIR = {
  readonly gets: ReadonlySet<string>;
  readonly sets: ReadonlySet<string>;
  readonly dels: ReadonlySet<string>;
  readonly calls: readonly CallSite[];
};

export type FunctionKind =
  | "function"
  | "lambda"
  | "class"
  | "method"
  | "staticmethod"
  | "classmethod";

export type FunctionRecord = {
  readonly qualifiedName: string;
  readonly kind: FunctionKind;
  readonly interface: CallInterface;
  readonly ir: FunctionIR;
  readonly location?: SourceLocation;
};

export type ModuleCategory = "local" | "pip" | "stdlib";

/**
 * An optional reference is a guess (`from pkg import name` may name a
 * submodule) and is never reported when it cannot be located.
 */
export type ImportReference = {
  readonly moduleName: string;
  readonly relative: boolean;
  readonly optional: boolean;
  readonly location: SourceLocation;
};

export type ModuleIR = {
  readonly path: string;
  readonly moduleName: string;
  readonly category: ModuleCategory;
  readonly functions: ReadonlyMap<string, FunctionRecord>;
  readonly symbols: ReadonlyMap<string, ContextSymbol>;
  readonly exports: readonly string[];
  readonly imports: readonly ImportReference[];
  /** Declarations skipped by an ignore override or an exclude pattern */
  readonly ignored: ReadonlySet<string>;
};

/**
 * Every module reachable from one target file
 */
export type Program = {
  readonly target: string;
  readonly modules: ReadonlyMap<string, ModuleIR>;
  readonly moduleNames: ReadonlyMap<string, string>;
};

export const createFunctionIR = (
  parts: {
    readonly gets?: Iterable<string>;
    readonly sets?: Iterable<string>;
    readonly dels?: Iterable<string>;
    readonly calls?: readonly CallSite[];
  } = {}
): FunctionIR => ({
  gets: new Set(parts.gets ?? []),
  sets: new Set(parts.sets ?? []),
  dels: new Set(parts.dels ?? []),
  calls: dedupeCalls(parts.calls ?? []),
});

export const callSiteKey = (site: CallSite): string => {
  const kwargs = Object.entries(site.kwargs)
    .map(([key, value]) => `${key}=${value}`)
    .join(",");
  const receiver = site.receiver !== undefined ? `${site.receiver}=` : "";
  return `${receiver}${site.name}(${site.args.join(",")};${kwargs})`;
};

/**
 * Drop repeated call sites, keeping the first occurrence in place
 */
export const dedupeCalls = (calls: readonly CallSite[]): readonly CallSite[] => {
  const seen = new Set<string>();
  const unique: CallSite[] = [];
  for (const call of calls) {
    const key = callSiteKey(call);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(call);
    }
  }
  return unique;
};

const union = (sets: readonly ReadonlySet<string>[]): Set<string> =>
  new Set(sets.flatMap((names) => [...names]));

/**
 * Fold the gets/sets/dels of `others` into `base`. Calls stay those of `base`.
 */
export const mergeEffects = (
  base: FunctionIR,
  ...others: readonly Pick<FunctionIR, "gets" | "sets" | "dels">[]
): FunctionIR => ({
  gets: union([base.gets, ...others.map((ir) => ir.gets)]),
  sets: union([base.sets, ...others.map((ir) => ir.sets)]),
  dels: union([base.dels, ...others.map((ir) => ir.dels)]),
  calls: base.calls,
});

export const sortedNames = (names: ReadonlySet<string>): readonly string[] =>
  [...names].sort();

const sameNames = (a: ReadonlySet<string>, b: ReadonlySet<string>): boolean =>
  a.size === b.size && [...a].every((name) => b.has(name));

export const functionIRsEqual = (a: FunctionIR, b: FunctionIR): boolean =>
  sameNames(a.gets, b.gets) &&
  sameNames(a.sets, b.sets) &&
  sameNames(a.dels, b.dels) &&
  a.calls.length === b.calls.length &&
  a.calls.every((call, i) => {
    const other = b.calls[i];
    return other !== undefined && callSiteKey(call) === callSiteKey(other);
  });
