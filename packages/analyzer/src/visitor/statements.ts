/**
 * Statement visitation inside a function body
 */

import { declare, declareName, resolve } from "../context/context.js";
import { declareLoopBindings } from "../context/declarations.js";
import { declareImports } from "../context/imports.js";
import { closureSymbol } from "../context/symbols.js";
import { formatName } from "../naming/format.js";
import { RETURN_VALUE } from "../naming/names.js";
import type { SyntaxNode } from "../syntax/parser.js";
import {
  decoratorsOf,
  definitionOf,
  field,
  fields,
  locationOf,
  namedChildrenOf,
  nameOf,
  unwrapParens,
} from "../syntax/nodes.js";
import { createDiagnostic } from "../types/diagnostic.js";
import { visitLambda, visitNestedFunction } from "./closures.js";
import {
  visitAccess,
  visitCall,
  visitChildren,
  visitExpression,
  visitTargetName,
} from "./expressions.js";
import type { AccessMode, VisitorState } from "./state.js";

const PATTERN_CONTAINERS = new Set([
  "pattern_list",
  "tuple_pattern",
  "list_pattern",
  "expression_list",
  "tuple",
  "list",
]);

const NO_EFFECT = new Set([
  "pass_statement",
  "break_statement",
  "continue_statement",
  "global_statement",
  "nonlocal_statement",
  "future_import_statement",
  "type_alias_statement",
  "comment",
]);

/**
 * Targets whose name can receive a call result
 */
const RECEIVERS = new Set(["identifier", "attribute", "subscript"]);

export const visitBody = (
  statements: readonly SyntaxNode[],
  state: VisitorState
): void => {
  for (const statement of statements) {
    visitStatement(statement, state);
  }
};

/**
 * Record a binding target in `mode`: identifiers are bound, patterns
 * recurse and attribute or subscript targets are accesses
 */
export const visitTarget = (
  raw: SyntaxNode,
  mode: AccessMode,
  state: VisitorState
): void => {
  const node = unwrapParens(raw);

  if (node.type === "identifier") {
    if (mode === "set") {
      visitTargetName(node.text, state);
    } else {
      visitAccess(node, mode, state);
    }
    return;
  }

  if (PATTERN_CONTAINERS.has(node.type)) {
    namedChildrenOf(node).forEach((child) => visitTarget(child, mode, state));
    return;
  }

  if (node.type === "list_splat_pattern" || node.type === "list_splat") {
    const inner = namedChildrenOf(node)[0];
    if (mode === "set" && inner?.type === "identifier") {
      state.ir.sets.add(`*${inner.text}`);
      declareName(state.ctx, inner.text);
      return;
    }
    visitAccess(node, mode, state);
    return;
  }

  if (node.type === "attribute" || node.type === "subscript") {
    visitAccess(node, mode, state);
    return;
  }

  visitExpression(node, state);
};

/**
 * `a = b = value`, `x: T = value` and `f = lambda ...`
 */
export const visitAssignment = (node: SyntaxNode, state: VisitorState): void => {
  const targets: SyntaxNode[] = [];
  let current: SyntaxNode | undefined = node;
  let value: SyntaxNode | undefined;

  while (current?.type === "assignment") {
    const left = field(current, "left");
    if (left) {
      targets.push(left);
    }
    value = field(current, "right");
    current = value;
  }

  // Annotation only: `x: int`
  if (!value) {
    return;
  }

  const rhs = unwrapParens(value);
  const [single] = targets;
  const target = targets.length === 1 && single ? unwrapParens(single) : undefined;

  if (rhs.type === "lambda" && target?.type === "identifier") {
    visitLambda(rhs, state);
    state.ir.sets.add(target.text);
    declare(state.ctx, closureSymbol(target.text));
    return;
  }

  if (rhs.type === "call" && target && RECEIVERS.has(target.type)) {
    visitCall(rhs, state, formatName(target).fullname);
  } else {
    visitExpression(rhs, state);
  }

  for (const left of targets) {
    visitTarget(left, "set", state);
  }
};

/**
 * `x += 1` reads and writes its target
 */
const visitAugmentedAssignment = (node: SyntaxNode, state: VisitorState): void => {
  const left = field(node, "left");
  const right = field(node, "right");
  if (right) {
    visitExpression(right, state);
  }
  if (left) {
    visitAccess(left, "get", state);
    visitTarget(left, "set", state);
  }
};

const visitDelete = (node: SyntaxNode, state: VisitorState): void => {
  for (const target of namedChildrenOf(node)) {
    visitTarget(target, "del", state);
  }
};

const visitReturn = (node: SyntaxNode, state: VisitorState): void => {
  const value = namedChildrenOf(node)[0];
  if (!value) {
    return;
  }
  const unwrapped = unwrapParens(value);
  if (unwrapped.type === "call") {
    visitCall(unwrapped, state, RETURN_VALUE);
  } else {
    visitExpression(unwrapped, state);
  }
};

/**
 * `expr as target` in with-items and except clauses
 */
const visitAsPattern = (node: SyntaxNode, state: VisitorState): void => {
  const alias = field(node, "alias");
  for (const child of namedChildrenOf(node)) {
    if (child.id === alias?.id) {
      continue;
    }
    visitExpression(child, state);
  }
  if (alias) {
    const target = alias.type === "as_pattern_target" ? namedChildrenOf(alias)[0] : alias;
    if (target) {
      visitTarget(target, "set", state);
    }
  }
};

const visitExcept = (node: SyntaxNode, state: VisitorState): void => {
  const alias = field(node, "alias");
  for (const child of namedChildrenOf(node)) {
    if (child.id === alias?.id) {
      continue;
    }
    if (child.type === "as_pattern") {
      visitAsPattern(child, state);
    } else if (child.type === "block") {
      visitBody(namedChildrenOf(child), state);
    } else {
      visitExpression(child, state);
    }
  }
  if (alias) {
    visitTarget(alias, "set", state);
  }
};

const visitFor = (node: SyntaxNode, state: VisitorState): void => {
  fields(node, "right").forEach((right) => visitExpression(right, state));
  declareLoopBindings(state.ctx, node);
  const left = field(node, "left");
  if (left) {
    visitTarget(left, "set", state);
  }
  visitCompound(node, state, new Set(["left", "right"]));
};

/**
 * Capture patterns bind names; value patterns (`Color.RED`) read them
 */
const visitPattern = (node: SyntaxNode, state: VisitorState): void => {
  switch (node.type) {
    case "dotted_name": {
      const parts = namedChildrenOf(node);
      const [only] = parts;
      if (parts.length === 1 && only) {
        if (only.text !== "_") {
          visitTargetName(only.text, state);
        }
        return;
      }
      if (only) {
        resolve(state.ctx, only.text, locationOf(node, state.module.path));
      }
      state.ir.gets.add(node.text);
      return;
    }
    case "identifier":
      if (node.text !== "_") {
        visitTargetName(node.text, state);
      }
      return;
    case "class_pattern": {
      const [cls, ...rest] = namedChildrenOf(node);
      if (cls) {
        const [root] = namedChildrenOf(cls);
        if (root) {
          resolve(state.ctx, root.text, locationOf(cls, state.module.path));
        }
        state.ir.gets.add(cls.text);
      }
      rest.forEach((child) => visitPattern(child, state));
      return;
    }
    case "keyword_pattern":
      namedChildrenOf(node)
        .slice(1)
        .forEach((child) => visitPattern(child, state));
      return;
    default:
      namedChildrenOf(node).forEach((child) => visitPattern(child, state));
  }
};

const visitMatch = (node: SyntaxNode, state: VisitorState): void => {
  fields(node, "subject").forEach((subject) => visitExpression(subject, state));
  const body = field(node, "body");
  const clauses = body ? namedChildrenOf(body) : [];

  for (const clause of clauses) {
    if (clause.type !== "case_clause") {
      continue;
    }
    for (const child of namedChildrenOf(clause)) {
      if (child.type === "case_pattern") {
        visitPattern(child, state);
      } else if (child.type === "if_clause") {
        visitChildren(child, state);
      } else if (child.type === "block") {
        visitBody(namedChildrenOf(child), state);
      }
    }
  }
};

/**
 * Nested classes are not analysed; their bases and decorators are reads
 */
const visitNestedClass = (definition: SyntaxNode, state: VisitorState): void => {
  const name = nameOf(definition);
  decoratorsOf(definition).forEach((decorator) => visitExpression(decorator, state));
  const superclasses = field(definition, "superclasses");
  if (superclasses) {
    visitChildren(superclasses, state);
  }
  declareName(state.ctx, name);
  state.report(
    createDiagnostic(
      "ATR3004",
      "info",
      `class '${name}' nested in '${state.owner}' is not analysed`,
      locationOf(definition, state.module.path)
    )
  );
};

/**
 * Generic compound statement: blocks are statement lists, clauses recurse
 * and anything else is an expression
 */
const visitCompound = (
  node: SyntaxNode,
  state: VisitorState,
  skipFields: ReadonlySet<string> = new Set()
): void => {
  const skipped = new Set(
    [...skipFields].flatMap((name) => fields(node, name).map((child) => child.id))
  );
  for (const child of namedChildrenOf(node)) {
    if (skipped.has(child.id)) {
      continue;
    }
    if (child.type === "block") {
      visitBody(namedChildrenOf(child), state);
    } else if (child.type.endsWith("_clause") || child.type.endsWith("_statement")) {
      visitStatement(child, state);
    } else {
      visitExpression(child, state);
    }
  }
};

export const visitStatement = (node: SyntaxNode, state: VisitorState): void => {
  if (NO_EFFECT.has(node.type)) {
    return;
  }

  switch (node.type) {
    case "expression_statement":
      for (const child of namedChildrenOf(node)) {
        if (child.type === "assignment") {
          visitAssignment(child, state);
        } else if (child.type === "augmented_assignment") {
          visitAugmentedAssignment(child, state);
        } else {
          visitExpression(child, state);
        }
      }
      return;
    case "return_statement":
      visitReturn(node, state);
      return;
    case "delete_statement":
      visitDelete(node, state);
      return;
    case "import_statement":
    case "import_from_statement":
      declareImports(state.ctx, node, state.module, state.expandStar);
      return;
    case "function_definition":
      visitNestedFunction(node, state);
      return;
    case "class_definition":
      visitNestedClass(node, state);
      return;
    case "decorated_definition": {
      const definition = definitionOf(node);
      if (definition.type === "class_definition") {
        visitNestedClass(definition, state);
      } else if (definition.type === "function_definition") {
        visitNestedFunction(definition, state);
      }
      return;
    }
    case "for_statement":
      visitFor(node, state);
      return;
    case "while_statement":
      declareLoopBindings(state.ctx, node);
      visitCompound(node, state);
      return;
    case "match_statement":
      visitMatch(node, state);
      return;
    case "except_clause":
    case "except_group_clause":
      visitExcept(node, state);
      return;
    case "with_item": {
      const value = field(node, "value");
      if (value?.type === "as_pattern") {
        visitAsPattern(value, state);
      } else if (value) {
        visitExpression(value, state);
      }
      return;
    }
    case "with_clause":
      namedChildrenOf(node).forEach((item) => visitStatement(item, state));
      return;
    case "block":
      visitBody(namedChildrenOf(node), state);
      return;
    default:
      visitCompound(node, state);
  }
};
