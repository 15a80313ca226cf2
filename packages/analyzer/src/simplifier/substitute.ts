/**
 * Rebasing callee effects onto a caller's actual arguments
 */

import { basenameOf, rebaseName } from "../naming/names.js";
import { parameterNames, type CallInterface, type FunctionIR } from "../types/ir.js";

export type Effects = {
  readonly gets: ReadonlySet<string>;
  readonly sets: ReadonlySet<string>;
  readonly dels: ReadonlySet<string>;
};

/**
 * `p.attr` with `p -> x` is `x.attr`. Names rooted at an unbound parameter
 * are dropped; any other name passes through unchanged.
 */
export const substituteName = (
  name: string,
  mapping: ReadonlyMap<string, string>,
  parameters: ReadonlySet<string>
): string | undefined => {
  const root = basenameOf(name);
  const actual = mapping.get(root);
  if (actual !== undefined) {
    return rebaseName(name, actual);
  }
  return parameters.has(root) ? undefined : name;
};

const substituteAll = (
  names: ReadonlySet<string>,
  mapping: ReadonlyMap<string, string>,
  parameters: ReadonlySet<string>
): ReadonlySet<string> => {
  const substituted = new Set<string>();
  for (const name of names) {
    const result = substituteName(name, mapping, parameters);
    if (result !== undefined) {
      substituted.add(result);
    }
  }
  return substituted;
};

export const substituteEffects = (
  ir: FunctionIR,
  iface: CallInterface,
  mapping: ReadonlyMap<string, string>
): Effects => {
  const parameters = new Set(parameterNames(iface));
  return {
    gets: substituteAll(ir.gets, mapping, parameters),
    sets: substituteAll(ir.sets, mapping, parameters),
    dels: substituteAll(ir.dels, mapping, parameters),
  };
};
