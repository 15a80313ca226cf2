/**
 * Pre-passes over a scope body: global/nonlocal declarations and the names
 * a loop binds
 *
 * Declarations affect the whole scope regardless of textual position, so they
 * are applied before any statement of the scope is visited.
 */

import type { SyntaxNode } from "../syntax/parser.js";
import {
  boundIdentifiers,
  field,
  fields,
  namedChildrenOf,
  unwrapParens,
} from "../syntax/nodes.js";
import {
  currentScope,
  declareName,
  isBoundIn,
  markGlobal,
  markNonlocal,
  type Context,
} from "./context.js";

const NESTED_SCOPES = new Set([
  "function_definition",
  "class_definition",
  "lambda",
  "list_comprehension",
  "set_comprehension",
  "dictionary_comprehension",
  "generator_expression",
]);

export type ScopeDeclarations = {
  readonly globals: readonly string[];
  readonly nonlocals: readonly string[];
};

export const collectDeclarations = (
  body: readonly SyntaxNode[]
): ScopeDeclarations => {
  const globals: string[] = [];
  const nonlocals: string[] = [];
  const stack = [...body];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || NESTED_SCOPES.has(node.type)) {
      continue;
    }
    if (node.type === "global_statement" || node.type === "nonlocal_statement") {
      const names = namedChildrenOf(node)
        .filter((child) => child.type === "identifier")
        .map((child) => child.text);
      (node.type === "global_statement" ? globals : nonlocals).push(...names);
      continue;
    }
    stack.push(...namedChildrenOf(node));
  }

  return { globals, nonlocals };
};

export const applyDeclarations = (
  ctx: Context,
  body: readonly SyntaxNode[]
): ScopeDeclarations => {
  const declarations = collectDeclarations(body);
  declarations.globals.forEach((name) => markGlobal(ctx, name));
  declarations.nonlocals.forEach((name) => markNonlocal(ctx, name));
  return declarations;
};

/**
 * Identifiers bound anywhere in `node` outside nested scopes
 */
export const collectBoundNames = (node: SyntaxNode): readonly string[] => {
  const names = new Set<string>();
  const stack = [node];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current || NESTED_SCOPES.has(current.type)) {
      continue;
    }
    switch (current.type) {
      case "assignment":
      case "augmented_assignment":
      case "for_statement":
        fields(current, "left").forEach((left) =>
          boundIdentifiers(unwrapParens(left)).forEach((name) => names.add(name))
        );
        break;
      case "named_expression": {
        const name = field(current, "name");
        if (name) {
          names.add(name.text);
        }
        break;
      }
    }
    stack.push(...namedChildrenOf(current));
  }

  return [...names].sort();
};

/**
 * Bind the names a loop assigns before its body is visited: a later
 * iteration reads what an earlier one wrote
 */
export const declareLoopBindings = (ctx: Context, loop: SyntaxNode): void => {
  const scope = currentScope(ctx);
  for (const name of collectBoundNames(loop)) {
    if (!isBoundIn(scope, name)) {
      declareName(ctx, name);
    }
  }
};
