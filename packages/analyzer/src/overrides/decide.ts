/**
 * Annotation overrides, decided once per declaration before its body is
 * visited
 */

import type { SyntaxNode } from "../syntax/parser.js";
import {
  decoratorName,
  field,
  locationOf,
  namedChildrenOf,
} from "../syntax/nodes.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { error, ok, type Result } from "../types/result.js";
import { evaluateLiteral, isLiteralList, type Literal } from "./literal.js";

export const IGNORE_DECORATOR = "attrtrace_ignore";
export const RESULTS_DECORATOR = "attrtrace_results";

/**
 * Package providing the decorators; never followed as an import
 */
export const OVERRIDE_PACKAGE = "attrtrace";

export type OverrideCall = {
  readonly name: string;
  readonly args: readonly string[];
  readonly kwargs: Readonly<Record<string, string>>;
};

export type ExplicitResults = {
  readonly gets: readonly string[];
  readonly sets: readonly string[];
  readonly dels: readonly string[];
  readonly calls: readonly OverrideCall[];
};

export type OverrideDecision =
  | { readonly kind: "normal" }
  | { readonly kind: "ignore" }
  | { readonly kind: "results"; readonly results: ExplicitResults };

const NORMAL: OverrideDecision = { kind: "normal" };

const EMPTY_RESULTS: ExplicitResults = {
  gets: [],
  sets: [],
  dels: [],
  calls: [],
};

type ShapeError = {
  readonly code: "ATR4001" | "ATR4002";
  readonly node: SyntaxNode;
  readonly message: string;
};

const shapeError = (node: SyntaxNode, message: string): ShapeError => ({
  code: "ATR4002",
  node,
  message,
});

const isStringArray = (value: Literal): value is readonly string[] =>
  isLiteralList(value) && value.every((item) => typeof item === "string");

const isStringRecord = (
  value: Literal
): value is { readonly [key: string]: string } =>
  value !== null &&
  typeof value === "object" &&
  !isLiteralList(value) &&
  Object.values(value).every((item) => typeof item === "string");

/**
 * `"f()"` or `("f()", (["arg"], {"key": "value"}))`
 */
const toOverrideCall = (value: Literal): OverrideCall | undefined => {
  if (typeof value === "string") {
    return value.endsWith("()")
      ? { name: value, args: [], kwargs: {} }
      : undefined;
  }
  if (!isLiteralList(value) || value.length !== 2) {
    return undefined;
  }
  const [name, binding] = value;
  if (
    typeof name !== "string" ||
    !name.endsWith("()") ||
    binding === undefined ||
    !isLiteralList(binding)
  ) {
    return undefined;
  }
  const [args, kwargs] = binding;
  if (binding.length !== 2 || args === undefined || kwargs === undefined) {
    return undefined;
  }
  if (!isStringArray(args) || !isStringRecord(kwargs)) {
    return undefined;
  }
  return { name, args, kwargs };
};

const SET_FIELDS = new Set(["gets", "sets", "dels"]);

const parseResults = (
  decorator: SyntaxNode
): Result<ExplicitResults, ShapeError> => {
  if (decorator.type !== "call") {
    return ok(EMPTY_RESULTS);
  }

  const argumentList = field(decorator, "arguments");
  const fields: Record<string, readonly string[]> = {};
  let calls: readonly OverrideCall[] = [];

  for (const argument of argumentList ? namedChildrenOf(argumentList) : []) {
    const key = field(argument, "name")?.text;
    const value = field(argument, "value");
    if (argument.type !== "keyword_argument" || !key || !value) {
      return error(
        shapeError(argument, `${RESULTS_DECORATOR} takes keyword arguments only`)
      );
    }
    if (!SET_FIELDS.has(key) && key !== "calls") {
      return error(
        shapeError(argument, `unknown ${RESULTS_DECORATOR} field '${key}'`)
      );
    }

    const literal = evaluateLiteral(value);
    if (!literal.ok) {
      return error({
        code: "ATR4001",
        node: literal.error,
        message: `'${literal.error.text}' is not a literal`,
      });
    }

    if (key === "calls") {
      const parsed = isLiteralList(literal.value)
        ? literal.value.map(toOverrideCall)
        : undefined;
      if (
        !parsed ||
        !parsed.every((call): call is OverrideCall => call !== undefined)
      ) {
        return error(
          shapeError(
            value,
            `'calls' must list "f()" or ("f()", ([args], {kwargs})) entries`
          )
        );
      }
      calls = parsed;
    } else {
      if (!isStringArray(literal.value)) {
        return error(
          shapeError(value, `'${key}' must be a collection of names`)
        );
      }
      fields[key] = literal.value;
    }
  }

  return ok({
    gets: fields["gets"] ?? [],
    sets: fields["sets"] ?? [],
    dels: fields["dels"] ?? [],
    calls,
  });
};

/**
 * NormalVisit, Ignore or ExplicitResults for a declaration's decorators.
 * An ignore marker wins over a results marker; a malformed results marker
 * is reported and discarded.
 */
export const decideOverride = (
  decorators: readonly SyntaxNode[],
  file: string,
  report: (diagnostic: Diagnostic) => void
): OverrideDecision => {
  const ignored = decorators.some(
    (decorator) => decoratorName(decorator) === IGNORE_DECORATOR
  );
  if (ignored) {
    return { kind: "ignore" };
  }

  const marker = decorators.find(
    (decorator) => decoratorName(decorator) === RESULTS_DECORATOR
  );
  if (!marker) {
    return NORMAL;
  }

  const results = parseResults(marker);
  if (!results.ok) {
    report(
      createDiagnostic(
        results.error.code,
        "error",
        `${results.error.message}; override discarded`,
        locationOf(results.error.node, file)
      )
    );
    return NORMAL;
  }

  return { kind: "results", results: results.value };
};
