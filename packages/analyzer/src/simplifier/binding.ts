/**
 * Call binding: actual arguments to formal parameters
 *
 * Follows ordinary binding rules: positional-only then regular parameters
 * fill in order, keywords bind by name, defaults fill what is left. Extra
 * positionals bind the vararg as a whole and extra keywords the kwarg.
 */

import { LOCAL_VALUE_PREFIX } from "../naming/names.js";
import type { CallInterface } from "../types/ir.js";

export const VARARG_VALUE = `${LOCAL_VALUE_PREFIX}Tuple`;
export const KWARG_VALUE = `${LOCAL_VALUE_PREFIX}Dict`;

export type BindingProblem = {
  readonly severity: "info" | "error";
  readonly message: string;
};

export type CallBinding = {
  readonly mapping: ReadonlyMap<string, string>;
  readonly problems: readonly BindingProblem[];
};

const isUnpacked = (argument: string): boolean => argument.startsWith("*");

export const bindArguments = (
  iface: CallInterface,
  args: readonly string[],
  kwargs: Readonly<Record<string, string>>
): CallBinding => {
  const mapping = new Map<string, string>();
  const problems: BindingProblem[] = [];
  const positional = [...iface.posonlyargs, ...iface.args];

  const unpackedAt = args.findIndex(isUnpacked);
  const unpacked = unpackedAt !== -1;
  const bound = unpacked ? args.slice(0, unpackedAt) : args;
  if (unpacked) {
    problems.push({
      severity: "info",
      message: "unpacked arguments are not bound to parameters",
    });
  }

  bound.forEach((argument, index) => {
    const parameter = positional[index];
    if (parameter !== undefined) {
      mapping.set(parameter, argument);
    } else if (iface.vararg === undefined) {
      problems.push({
        severity: "error",
        message: `takes ${positional.length} positional arguments but ${bound.length} were given`,
      });
    }
  });

  if (iface.vararg !== undefined) {
    mapping.set(iface.vararg, VARARG_VALUE);
  }
  if (iface.kwarg !== undefined) {
    mapping.set(iface.kwarg, KWARG_VALUE);
  }

  const byKeyword = new Set([...iface.args, ...iface.kwonlyargs]);
  for (const [keyword, value] of Object.entries(kwargs)) {
    if (byKeyword.has(keyword)) {
      if (mapping.has(keyword)) {
        problems.push({
          severity: "error",
          message: `got multiple values for argument '${keyword}'`,
        });
      } else {
        mapping.set(keyword, value);
      }
    } else if (iface.kwarg === undefined) {
      problems.push({
        severity: "error",
        message: iface.posonlyargs.includes(keyword)
          ? `positional-only argument '${keyword}' passed as keyword`
          : `got an unexpected keyword argument '${keyword}'`,
      });
    }
  }

  for (const parameter of [...positional, ...iface.kwonlyargs]) {
    if (mapping.has(parameter)) {
      continue;
    }
    const fallback = iface.defaults[parameter];
    if (fallback !== undefined) {
      mapping.set(parameter, fallback);
    } else if (!unpacked) {
      problems.push({
        severity: "error",
        message: `missing argument '${parameter}'`,
      });
    }
  }

  return { mapping, problems: dedupeProblems(problems) };
};

const dedupeProblems = (
  problems: readonly BindingProblem[]
): readonly BindingProblem[] => {
  const seen = new Set<string>();
  return problems.filter((problem) => {
    if (seen.has(problem.message)) {
      return false;
    }
    seen.add(problem.message);
    return true;
  });
};
