/**
 * Builtins with dedicated handling
 *
 * A handled call replaces the ordinary call record: `getattr(o, "a")` is a
 * get of `o.a`, not a call to `getattr()`.
 */

import { lookup } from "../context/context.js";
import { dynamicAttribute, positionalArguments } from "../naming/format.js";
import type { SyntaxNode } from "../syntax/parser.js";
import { field, locationOf, namedChildrenOf, stringValue } from "../syntax/nodes.js";
import { createDiagnostic } from "../types/diagnostic.js";
import { visitLambda } from "./closures.js";
import { visitAccess, visitExpression } from "./expressions.js";
import type { AccessMode, VisitorState } from "./state.js";

type BuiltinHandler = (
  call: SyntaxNode,
  args: readonly SyntaxNode[],
  state: VisitorState
) => boolean;

/**
 * Attribute name of a reflective builtin, warning when it is not a literal
 */
const attributeOf = (node: SyntaxNode, state: VisitorState): string => {
  if (stringValue(node) === undefined) {
    state.report(
      createDiagnostic(
        "ATR3001",
        "warning",
        `dynamic attribute name '${node.text}', recorded as a placeholder`,
        locationOf(node, state.module.path)
      )
    );
    visitExpression(node, state);
  }
  return dynamicAttribute(node);
};

const reflective =
  (mode: AccessMode): BuiltinHandler =>
  (_call, args, state) => {
    const [object, attribute, ...rest] = args;
    if (!object || !attribute) {
      return false;
    }
    const name = attributeOf(attribute, state);
    visitAccess(object, mode, state, (fullname) => `${fullname}.${name}`);
    rest.forEach((arg) => visitExpression(arg, state));
    return true;
  };

const keywordArguments = (call: SyntaxNode): readonly SyntaxNode[] => {
  const argumentList = field(call, "arguments");
  return argumentList
    ? namedChildrenOf(argumentList).filter(
        (arg) => arg.type === "keyword_argument"
      )
    : [];
};

/**
 * `sorted(xs, key=lambda p: p.age)` reads `xs.age`
 */
const sorted: BuiltinHandler = (call, args, state) => {
  const [iterable, ...rest] = args;
  if (!iterable) {
    return false;
  }
  visitExpression(iterable, state);
  rest.forEach((arg) => visitExpression(arg, state));

  for (const keyword of keywordArguments(call)) {
    const value = field(keyword, "value");
    if (!value) {
      continue;
    }
    if (field(keyword, "name")?.text === "key" && value.type === "lambda") {
      visitLambda(value, state, iterable);
    } else {
      visitExpression(value, state);
    }
  }
  return true;
};

const HANDLERS: Readonly<Record<string, BuiltinHandler>> = {
  getattr: reflective("get"),
  hasattr: reflective("get"),
  setattr: reflective("set"),
  delattr: reflective("del"),
  sorted,
};

/**
 * Handle `call` when its callee is one of the builtins above.
 * Returns false when the ordinary call path should be taken.
 */
export const handleBuiltinCall = (
  call: SyntaxNode,
  state: VisitorState
): boolean => {
  const callee = field(call, "function");
  if (!callee || callee.type !== "identifier") {
    return false;
  }
  const handler = Object.hasOwn(HANDLERS, callee.text)
    ? HANDLERS[callee.text]
    : undefined;
  if (!handler || lookup(state.ctx, callee.text)?.kind !== "builtin") {
    return false;
  }
  return handler(call, positionalArguments(call), state);
};
