/**
 * Literal evaluation for override decorator arguments
 *
 * Only names, plain strings, None and containers of those evaluate.
 * Anything else is rejected with the offending node.
 */

import type { SyntaxNode } from "../syntax/parser.js";
import {
  field,
  namedChildrenOf,
  stringValue,
  unwrapParens,
} from "../syntax/nodes.js";
import { collect, error, ok, type Result } from "../types/result.js";

export type Literal =
  | string
  | null
  | readonly Literal[]
  | { readonly [key: string]: Literal };

export const isLiteralList = (value: Literal): value is readonly Literal[] =>
  Array.isArray(value);

const isDottedName = (node: SyntaxNode): boolean => {
  if (node.type === "identifier") {
    return true;
  }
  const object = field(node, "object");
  return node.type === "attribute" && object !== undefined && isDottedName(object);
};

const evaluateDictionary = (
  node: SyntaxNode
): Result<Literal, SyntaxNode> => {
  const entries: [string, Literal][] = [];
  for (const pair of namedChildrenOf(node)) {
    const key = field(pair, "key");
    const value = field(pair, "value");
    if (pair.type !== "pair" || !key || !value) {
      return error(pair);
    }
    const name = stringValue(key);
    if (name === undefined) {
      return error(key);
    }
    const evaluated = evaluateLiteral(value);
    if (!evaluated.ok) {
      return evaluated;
    }
    entries.push([name, evaluated.value]);
  }
  return ok(Object.fromEntries(entries));
};

export const evaluateLiteral = (raw: SyntaxNode): Result<Literal, SyntaxNode> => {
  const node = unwrapParens(raw);
  switch (node.type) {
    case "string":
    case "concatenated_string": {
      const value = stringValue(node);
      return value !== undefined ? ok(value) : error(node);
    }
    case "none":
      return ok(null);
    case "identifier":
    case "attribute":
      return isDottedName(node) ? ok(node.text) : error(node);
    case "list":
    case "tuple":
    case "set":
      return collect(namedChildrenOf(node).map(evaluateLiteral));
    case "dictionary":
      return evaluateDictionary(node);
    default:
      return error(node);
  }
};
