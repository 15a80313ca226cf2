/**
 * Accessors over tree-sitter-python syntax nodes
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { SyntaxNode } from "./parser.js";

export const field = (
  node: SyntaxNode,
  name: string
): SyntaxNode | undefined => node.childForFieldName(name) ?? undefined;

export const fields = (
  node: SyntaxNode,
  name: string
): readonly SyntaxNode[] => node.childrenForFieldName(name);

export const locationOf = (node: SyntaxNode, file: string): SourceLocation => ({
  file,
  line: node.startPosition.row + 1,
  column: node.startPosition.column + 1,
  length: node.endIndex - node.startIndex,
});

export const unwrapParens = (node: SyntaxNode): SyntaxNode => {
  let current = node;
  while (current.type === "parenthesized_expression") {
    const inner = current.namedChildren[0];
    if (!inner) {
      break;
    }
    current = inner;
  }
  return current;
};

export const isComment = (node: SyntaxNode): boolean => node.type === "comment";

/**
 * Named children that are not comments
 */
export const namedChildrenOf = (node: SyntaxNode): readonly SyntaxNode[] =>
  node.namedChildren.filter((child) => !isComment(child));

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "\\n": "\n",
  "\\t": "\t",
  "\\\\": "\\",
  "\\'": "'",
  '\\"': '"',
};

/**
 * Value of a plain string literal; undefined for f-strings, bytes and
 * anything that is not a string
 */
export const stringValue = (node: SyntaxNode): string | undefined => {
  const target = unwrapParens(node);
  if (target.type === "concatenated_string") {
    const parts = namedChildrenOf(target).map(stringValue);
    return parts.every((part): part is string => part !== undefined)
      ? parts.join("")
      : undefined;
  }
  if (target.type !== "string") {
    return undefined;
  }

  const prefix = target.child(0)?.text.toLowerCase() ?? "";
  if (prefix.includes("f") || prefix.includes("b")) {
    return undefined;
  }

  let value = "";
  for (const child of target.namedChildren) {
    switch (child.type) {
      case "string_start":
      case "string_end":
        break;
      case "string_content":
        value += child.text;
        break;
      case "escape_sequence":
        value += SIMPLE_ESCAPES[child.text] ?? child.text;
        break;
      default:
        return undefined;
    }
  }
  return value;
};

/**
 * Decorator expressions attached to a function or class definition
 */
export const decoratorsOf = (definition: SyntaxNode): readonly SyntaxNode[] => {
  const parent = definition.parent;
  if (!parent || parent.type !== "decorated_definition") {
    return [];
  }
  return parent.namedChildren
    .filter((child) => child.type === "decorator")
    .flatMap((decorator) => {
      const expression = decorator.namedChildren[0];
      return expression ? [expression] : [];
    });
};

/**
 * The definition inside a possibly decorated statement
 */
export const definitionOf = (statement: SyntaxNode): SyntaxNode =>
  statement.type === "decorated_definition"
    ? (field(statement, "definition") ?? statement)
    : statement;

export const nameOf = (definition: SyntaxNode): string =>
  field(definition, "name")?.text ?? "";

export const bodyStatements = (definition: SyntaxNode): readonly SyntaxNode[] => {
  const body = field(definition, "body");
  return body ? namedChildrenOf(body) : [];
};

/**
 * Last dotted segment of a decorator, ignoring a call: `@a.b(...)` is "b"
 */
export const decoratorName = (decorator: SyntaxNode): string => {
  const target =
    decorator.type === "call" ? field(decorator, "function") : decorator;
  if (!target) {
    return "";
  }
  if (target.type === "attribute") {
    return field(target, "attribute")?.text ?? "";
  }
  return target.type === "identifier" ? target.text : "";
};

const PATTERN_CONTAINERS = new Set([
  "pattern_list",
  "tuple_pattern",
  "list_pattern",
  "expression_list",
  "tuple",
  "list",
  "parenthesized_expression",
  "list_splat_pattern",
  "list_splat",
]);

/**
 * Identifiers a binding target introduces: `a, (b, *c)` binds a, b and c.
 * Attribute and subscript targets bind nothing.
 */
export const boundIdentifiers = (target: SyntaxNode): readonly string[] => {
  if (target.type === "identifier") {
    return [target.text];
  }
  if (!PATTERN_CONTAINERS.has(target.type)) {
    return [];
  }
  return namedChildrenOf(target).flatMap(boundIdentifiers);
};
