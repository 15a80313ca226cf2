/**
 * Closures: nested functions, lambdas and comprehensions
 *
 * A closure body is analysed in its own scope with its own builder. Names
 * rooted at the closure's own bindings are dropped, names rooted at a
 * rebound target are rebased onto the bound value, and everything else is
 * folded into the enclosing function.
 */

import {
  declare,
  isBoundIn,
  withScope,
  type Context,
  type Scope,
} from "../context/context.js";
import { applyDeclarations } from "../context/declarations.js";
import { declareParameters, interfaceOf } from "../context/interface.js";
import { closureSymbol, nameSymbol } from "../context/symbols.js";
import { formatName } from "../naming/format.js";
import {
  LOCAL_VALUE_PREFIX,
  basenameOf,
  isSynthesized,
  rebaseName,
} from "../naming/names.js";
import type { SyntaxNode } from "../syntax/parser.js";
import {
  bodyStatements,
  boundIdentifiers,
  decoratorsOf,
  field,
  fields,
  locationOf,
  namedChildrenOf,
  nameOf,
} from "../syntax/nodes.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { CallSite } from "../types/ir.js";
import { visitExpression } from "./expressions.js";
import {
  createBuilder,
  withBuilder,
  type IrBuilder,
  type VisitorState,
} from "./state.js";
import { visitBody } from "./statements.js";

/**
 * Stands in for a call argument bound only inside a closure
 */
const CLOSURE_LOCAL = `${LOCAL_VALUE_PREFIX}Local`;

type ClosureKind = "function" | "comprehension";

type Rebinding = Map<string, string>;

/**
 * Map a name recorded in the closure to its enclosing-scope form, or
 * undefined when it belongs to the closure alone
 */
const foldName = (
  scope: Scope,
  rebind: ReadonlyMap<string, string>,
  name: string
): string | undefined => {
  const root = basenameOf(name);
  const target = rebind.get(root);
  if (target !== undefined) {
    return rebaseName(name, target);
  }
  return isBoundIn(scope, root) ? undefined : name;
};

const foldCall = (
  scope: Scope,
  rebind: ReadonlyMap<string, string>,
  call: CallSite
): CallSite | undefined => {
  const name = foldName(scope, rebind, call.name);
  if (name === undefined) {
    return undefined;
  }
  const argument = (value: string): string =>
    foldName(scope, rebind, value) ?? CLOSURE_LOCAL;
  const kwargs = Object.fromEntries(
    Object.entries(call.kwargs).map(([key, value]) => [key, argument(value)])
  );
  return {
    ...call,
    name,
    args: call.args.map(argument),
    kwargs,
    ...(call.receiver !== undefined ? { receiver: argument(call.receiver) } : {}),
  };
};

/**
 * Enclosing-function names a closure reads or writes
 */
const capturedNames = (ctx: Context, closure: IrBuilder): readonly string[] => {
  const enclosing = ctx.scopes.slice(0, -1).reverse();
  const roots = new Set(
    [
      ...closure.gets,
      ...closure.sets,
      ...closure.dels,
      ...closure.calls.map((call) => call.name),
    ].map(basenameOf)
  );
  return [...roots]
    .filter((root) => {
      const owner = enclosing.find(
        (scope) => scope.kind !== "class" && scope.symbols.has(root)
      );
      return owner?.kind === "function";
    })
    .sort();
};

const foldClosure = (
  state: VisitorState,
  kind: ClosureKind,
  name: string,
  node: SyntaxNode,
  analyse: (inner: VisitorState, rebind: Rebinding) => void
): void => {
  const builder = createBuilder();
  const rebind: Rebinding = new Map();

  withScope(state.ctx, kind, name, (scope) => {
    analyse(withBuilder(state, builder, kind === "function"), rebind);

    const captured = kind === "function" ? capturedNames(state.ctx, builder) : [];
    const fold = (from: ReadonlySet<string>, into: Set<string>): void => {
      for (const recorded of from) {
        const folded = foldName(scope, rebind, recorded);
        if (folded !== undefined) {
          into.add(folded);
        }
      }
    };

    fold(builder.gets, state.ir.gets);
    fold(builder.sets, state.ir.sets);
    fold(builder.dels, state.ir.dels);
    for (const call of builder.calls) {
      const folded = foldCall(scope, rebind, call);
      if (folded) {
        state.ir.calls.push(folded);
      }
    }

    if (captured.length > 0) {
      state.report(
        createDiagnostic(
          "ATR3003",
          "info",
          `closure '${name}' in '${state.owner}' folded into its enclosing function, capturing ${captured.join(", ")}`,
          locationOf(node, state.module.path)
        )
      );
    }
  });
};

/**
 * Default values are evaluated in the enclosing scope at definition time
 */
const visitDefaults = (
  parameters: SyntaxNode | undefined,
  state: VisitorState
): void => {
  if (!parameters) {
    return;
  }
  for (const parameter of namedChildrenOf(parameters)) {
    if (
      parameter.type === "default_parameter" ||
      parameter.type === "typed_default_parameter"
    ) {
      const value = field(parameter, "value");
      if (value) {
        visitExpression(value, state);
      }
    }
  }
};

/**
 * `def` nested inside a function body
 */
export const visitNestedFunction = (
  definition: SyntaxNode,
  state: VisitorState
): void => {
  const name = nameOf(definition);
  const parameters = field(definition, "parameters");

  decoratorsOf(definition).forEach((decorator) =>
    visitExpression(decorator, state)
  );
  visitDefaults(parameters, state);
  declare(state.ctx, closureSymbol(name));

  foldClosure(state, "function", name, definition, (inner) => {
    const body = bodyStatements(definition);
    declareParameters(inner.ctx, interfaceOf(parameters));
    const { globals } = applyDeclarations(inner.ctx, body);
    visitBody(body, { ...inner, owner: `${state.owner}.${name}` });

    const written = globals.filter(
      (global) => inner.ir.sets.has(global) || inner.ir.dels.has(global)
    );
    if (written.length > 0) {
      state.report(
        createDiagnostic(
          "ATR3005",
          "fatal",
          `nested function '${name}' writes global '${written.join(", ")}'`,
          locationOf(definition, state.module.path),
          "move the global write into a module-level function"
        )
      );
    }
  });
};

/**
 * Anonymous lambda. With `rebindTo`, a single-parameter lambda has its
 * parameter rebound to that expression's name (`sorted(xs, key=...)`).
 */
export const visitLambda = (
  node: SyntaxNode,
  state: VisitorState,
  rebindTo?: SyntaxNode
): void => {
  const parameters = field(node, "parameters");
  const iface = interfaceOf(parameters);
  visitDefaults(parameters, state);

  foldClosure(state, "function", "<lambda>", node, (inner, rebind) => {
    declareParameters(inner.ctx, iface);
    const [parameter] = iface.args;
    if (rebindTo && parameter !== undefined && iface.args.length === 1) {
      const bound = formatName(rebindTo).fullname;
      if (!isSynthesized(bound)) {
        rebind.set(parameter, bound);
      }
    }
    const body = field(node, "body");
    if (body) {
      visitExpression(body, inner);
    }
  });
};

/**
 * Name a comprehension target is rebound to, when the iterable is a plain
 * access (not a call and not synthesized)
 */
const iterableName = (
  iterable: SyntaxNode,
  rebind: ReadonlyMap<string, string>
): string | undefined => {
  const name = formatName(iterable).fullname;
  if (isSynthesized(name) || name.endsWith("()") || name.startsWith("*")) {
    return undefined;
  }
  const outer = rebind.get(basenameOf(name));
  return outer !== undefined ? rebaseName(name, outer) : name;
};

export const visitComprehension = (node: SyntaxNode, state: VisitorState): void => {
  const clauses = namedChildrenOf(node).filter(
    (child) => child.type === "for_in_clause" || child.type === "if_clause"
  );
  const [first] = clauses;

  // The outermost iterable is evaluated in the enclosing scope
  if (first?.type === "for_in_clause") {
    fields(first, "right").forEach((right) => visitExpression(right, state));
  }

  foldClosure(state, "comprehension", `<${node.type}>`, node, (inner, rebind) => {
    for (const clause of clauses) {
      if (clause.type === "if_clause") {
        namedChildrenOf(clause).forEach((condition) =>
          visitExpression(condition, inner)
        );
        continue;
      }

      const rights = fields(clause, "right");
      if (clause.id !== first?.id) {
        rights.forEach((right) => visitExpression(right, inner));
      }

      const left = field(clause, "left");
      if (!left) {
        continue;
      }
      const names = boundIdentifiers(left);
      names.forEach((identifier) =>
        declare(inner.ctx, nameSymbol(identifier, "local-assignment"))
      );

      const [iterable] = rights;
      const target =
        iterable && rights.length === 1
          ? iterableName(iterable, rebind)
          : undefined;
      if (left.type === "identifier" && target !== undefined) {
        rebind.set(left.text, target);
      }
    }

    const body = field(node, "body");
    if (body) {
      visitExpression(body, inner);
    }
  });
};
