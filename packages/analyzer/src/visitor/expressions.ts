/**
 * Expression visitation: gets, accesses and calls
 */

import {
  assignmentExpressionScope,
  declareName,
  resolve,
} from "../context/context.js";
import { formatName, type FormattedName } from "../naming/format.js";
import { attributePrefixes, isSynthesized } from "../naming/names.js";
import type { SyntaxNode } from "../syntax/parser.js";
import {
  field,
  locationOf,
  namedChildrenOf,
  unwrapParens,
} from "../syntax/nodes.js";
import { handleBuiltinCall } from "./builtin-calls.js";
import { visitComprehension, visitLambda } from "./closures.js";
import { record, type AccessMode, type VisitorState } from "./state.js";
import { callTargetFor } from "./targets.js";

const ACCESS_TYPES = new Set([
  "identifier",
  "attribute",
  "subscript",
  "list_splat",
  "dictionary_splat",
]);

const COMPREHENSIONS = new Set([
  "list_comprehension",
  "set_comprehension",
  "dictionary_comprehension",
  "generator_expression",
]);

/**
 * Node kinds whose children are not reads of the enclosing scope
 */
const SKIPPED = new Set([
  "type",
  "comment",
  "keyword_separator",
  "positional_separator",
]);

export const isAccess = (node: SyntaxNode): boolean => ACCESS_TYPES.has(node.type);

/**
 * Visit every named child as a get
 */
export const visitChildren = (node: SyntaxNode, state: VisitorState): void => {
  for (const child of namedChildrenOf(node)) {
    visitExpression(child, state);
  }
};

/**
 * Visit the sub-accesses and nested calls a formatted name dominates
 */
export const visitDominated = (
  node: SyntaxNode,
  name: FormattedName,
  state: VisitorState
): void => {
  for (const sub of name.subAccesses) {
    if (sub.id === node.id) {
      visitChildren(sub, state);
    } else {
      visitExpression(sub, state);
    }
  }
  for (const call of name.calls) {
    visitCall(call, state);
  }
};

/**
 * Record one access event for `node` and visit what it dominates.
 * `rename` rewrites the recorded name (used by builtin handlers).
 */
export const visitAccess = (
  raw: SyntaxNode,
  mode: AccessMode,
  state: VisitorState,
  rename: (fullname: string) => string = (fullname) => fullname
): void => {
  const node = unwrapParens(raw);
  if (node.type === "call") {
    visitCall(node, state);
    return;
  }

  const name = formatName(node);
  if (!isSynthesized(name.fullname)) {
    resolve(state.ctx, name.basename, locationOf(node, state.module.path));
  }
  record(state.ir, mode, rename(name.fullname));
  visitDominated(node, name, state);
};

export type CallArguments = {
  readonly args: readonly string[];
  readonly kwargs: Readonly<Record<string, string>>;
  readonly nodes: readonly SyntaxNode[];
};

/**
 * Canonical names of a call's actual arguments, plus the nodes to visit
 */
export const callArguments = (call: SyntaxNode): CallArguments => {
  const argumentList = field(call, "arguments");
  if (!argumentList) {
    return { args: [], kwargs: {}, nodes: [] };
  }
  if (argumentList.type !== "argument_list") {
    return {
      args: [formatName(argumentList).fullname],
      kwargs: {},
      nodes: [argumentList],
    };
  }

  const args: string[] = [];
  // Collected as pairs so that any keyword, `__proto__` included, stays an own key
  const keywords: [string, string][] = [];
  const nodes: SyntaxNode[] = [];

  for (const arg of namedChildrenOf(argumentList)) {
    if (arg.type === "keyword_argument") {
      const name = field(arg, "name")?.text;
      const value = field(arg, "value");
      if (name && value) {
        keywords.push([name, formatName(value).fullname]);
        nodes.push(value);
      }
      continue;
    }
    args.push(formatName(arg).fullname);
    nodes.push(arg);
  }

  return { args, kwargs: Object.fromEntries(keywords), nodes };
};

/**
 * Record a call event. `receiver` is the name the result is bound to.
 */
export const visitCall = (
  node: SyntaxNode,
  state: VisitorState,
  receiver?: string
): void => {
  if (handleBuiltinCall(node, state)) {
    return;
  }

  const name = formatName(node);
  const location = locationOf(node, state.module.path);
  const { args, kwargs, nodes } = callArguments(node);

  for (const prefix of attributePrefixes(name.fullname)) {
    state.ir.gets.add(prefix);
  }

  const target = callTargetFor(state.ctx, name.fullname, location);
  state.ir.calls.push({
    name: name.fullname,
    args,
    kwargs,
    target,
    ...(receiver !== undefined ? { receiver } : {}),
    location,
  });

  visitDominated(node, name, state);
  for (const arg of nodes) {
    visitExpression(arg, state);
  }
};

export const visitExpression = (raw: SyntaxNode, state: VisitorState): void => {
  const node = unwrapParens(raw);

  if (SKIPPED.has(node.type)) {
    return;
  }

  if (isAccess(node)) {
    visitAccess(node, "get", state);
    return;
  }

  if (COMPREHENSIONS.has(node.type)) {
    visitComprehension(node, state);
    return;
  }

  switch (node.type) {
    case "call":
      visitCall(node, state);
      return;
    case "lambda":
      visitLambda(node, state);
      return;
    case "keyword_argument": {
      const value = field(node, "value");
      if (value) {
        visitExpression(value, state);
      }
      return;
    }
    case "named_expression": {
      const value = field(node, "value");
      const name = field(node, "name");
      if (value) {
        visitExpression(value, state);
      }
      if (name) {
        state.ir.sets.add(name.text);
        declareName(
          state.ctx,
          name.text,
          "local-assignment",
          assignmentExpressionScope(state.ctx)
        );
      }
      return;
    }
    default:
      visitChildren(node, state);
  }
};

/**
 * Set a bare identifier and bind it in the current scope
 */
export const visitTargetName = (identifier: string, state: VisitorState): void => {
  state.ir.sets.add(identifier);
  declareName(state.ctx, identifier);
};
