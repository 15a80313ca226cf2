/**
 * Context - scope-chain symbol table
 *
 * Lookup walks innermost-first. Class scopes are only visible while they are
 * the current scope, so methods never see class-body names lexically.
 */

import { createDiagnostic, fileLocation } from "../types/diagnostic.js";
import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import { PYTHON_BUILTINS } from "./builtins.js";
import {
  builtinSymbol,
  nameSymbol,
  withOrigin,
  type ContextSymbol,
} from "./symbols.js";

export type ScopeKind =
  | "builtin"
  | "module"
  | "class"
  | "function"
  | "comprehension";

export type Scope = {
  readonly kind: ScopeKind;
  readonly name: string;
  readonly symbols: Map<string, ContextSymbol>;
  readonly globals: Set<string>;
  readonly nonlocals: Set<string>;
};

export type Context = {
  readonly file: string;
  readonly scopes: Scope[];
  readonly report: (diagnostic: Diagnostic) => void;
};

const createScope = (kind: ScopeKind, name: string): Scope => ({
  kind,
  name,
  symbols: new Map(),
  globals: new Set(),
  nonlocals: new Set(),
});

/**
 * New context holding a builtin scope and an empty module scope
 */
export const createContext = (
  file: string,
  report: (diagnostic: Diagnostic) => void,
  builtins: Iterable<string> = PYTHON_BUILTINS
): Context => {
  const builtinScope = createScope("builtin", "builtins");
  for (const name of builtins) {
    builtinScope.symbols.set(name, builtinSymbol(name));
  }
  return {
    file,
    scopes: [builtinScope, createScope("module", "<module>")],
    report,
  };
};

export const currentScope = (ctx: Context): Scope => {
  const scope = ctx.scopes[ctx.scopes.length - 1];
  if (!scope) {
    throw new Error("ICE: context has no scopes");
  }
  return scope;
};

export const moduleScope = (ctx: Context): Scope => {
  const scope = ctx.scopes.find((candidate) => candidate.kind === "module");
  if (!scope) {
    throw new Error("ICE: context has no module scope");
  }
  return scope;
};

export const pushScope = (ctx: Context, kind: ScopeKind, name: string): Scope => {
  const scope = createScope(kind, name);
  ctx.scopes.push(scope);
  return scope;
};

export const popScope = (ctx: Context): void => {
  if (ctx.scopes.length <= 2) {
    throw new Error("ICE: cannot pop the module scope");
  }
  ctx.scopes.pop();
};

/**
 * Run `fn` inside a fresh scope
 */
export const withScope = <T>(
  ctx: Context,
  kind: ScopeKind,
  name: string,
  fn: (scope: Scope) => T
): T => {
  const scope = pushScope(ctx, kind, name);
  try {
    return fn(scope);
  } finally {
    popScope(ctx);
  }
};

export const markGlobal = (ctx: Context, identifier: string): void => {
  currentScope(ctx).globals.add(identifier);
};

export const markNonlocal = (ctx: Context, identifier: string): void => {
  currentScope(ctx).nonlocals.add(identifier);
};

/**
 * Nearest enclosing function scope (outside `from`) that binds `identifier`
 */
const nonlocalTarget = (
  ctx: Context,
  from: Scope,
  identifier: string
): Scope | undefined => {
  const index = ctx.scopes.indexOf(from);
  const candidates = ctx.scopes
    .slice(0, index)
    .filter((scope) => scope.kind === "function" || scope.kind === "comprehension")
    .reverse();
  return (
    candidates.find((scope) => scope.symbols.has(identifier)) ?? candidates[0]
  );
};

/**
 * Bind a symbol, following global/nonlocal redirection of `scope`
 */
export const declare = (
  ctx: Context,
  symbol: ContextSymbol,
  scope: Scope = currentScope(ctx)
): void => {
  if (scope.globals.has(symbol.name)) {
    const target = moduleScope(ctx);
    const existing = target.symbols.get(symbol.name);
    target.symbols.set(
      symbol.name,
      existing && symbol.kind === "name"
        ? existing
        : withOrigin(symbol, "global-declared")
    );
    return;
  }

  if (scope.nonlocals.has(symbol.name)) {
    const target = nonlocalTarget(ctx, scope, symbol.name);
    if (target) {
      target.symbols.set(symbol.name, withOrigin(symbol, "nonlocal-declared"));
      return;
    }
  }

  scope.symbols.set(symbol.name, symbol);
};

/**
 * Resolve without reporting
 */
export const lookup = (
  ctx: Context,
  identifier: string
): ContextSymbol | undefined => {
  const innermost = ctx.scopes.length - 1;
  for (let i = innermost; i >= 0; i--) {
    const scope = ctx.scopes[i];
    if (!scope || (scope.kind === "class" && i !== innermost)) {
      continue;
    }
    if (scope.globals.has(identifier)) {
      return (
        moduleScope(ctx).symbols.get(identifier) ??
        ctx.scopes[0]?.symbols.get(identifier)
      );
    }
    if (scope.nonlocals.has(identifier)) {
      continue;
    }
    const symbol = scope.symbols.get(identifier);
    if (symbol) {
      return symbol;
    }
  }
  return undefined;
};

/**
 * Resolve an identifier; an unresolved name is a warning, never a failure
 */
export const resolve = (
  ctx: Context,
  identifier: string,
  location?: SourceLocation
): ContextSymbol | undefined => {
  const symbol = lookup(ctx, identifier);
  if (!symbol) {
    ctx.report(
      createDiagnostic(
        "ATR2001",
        "warning",
        `'${identifier}' potentially undefined`,
        location ?? fileLocation(ctx.file)
      )
    );
  }
  return symbol;
};

/**
 * True when `identifier` is a parameter or local of `scope` itself
 */
export const isBoundIn = (scope: Scope, identifier: string): boolean =>
  !scope.globals.has(identifier) &&
  !scope.nonlocals.has(identifier) &&
  scope.symbols.has(identifier);

/**
 * Scope an assignment expression (`:=`) binds in: comprehensions bind
 * their walrus targets in the nearest enclosing scope that is not one
 */
export const assignmentExpressionScope = (ctx: Context): Scope => {
  const scope = [...ctx.scopes]
    .reverse()
    .find((candidate) => candidate.kind !== "comprehension");
  return scope ?? currentScope(ctx);
};

/**
 * Declare a plain name binding unless the scope already holds a richer one
 */
export const declareName = (
  ctx: Context,
  identifier: string,
  origin: ContextSymbol["origin"] = "local-assignment",
  scope: Scope = currentScope(ctx)
): void => {
  if (isBoundIn(scope, identifier) && scope.kind !== "module") {
    return;
  }
  declare(ctx, nameSymbol(identifier, origin), scope);
};
