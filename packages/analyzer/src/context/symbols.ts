/**
 * Symbols held by Context scopes
 */

import type { CallInterface } from "../types/ir.js";

export type SymbolOrigin =
  | "parameter"
  | "local-assignment"
  | "import"
  | "class-attribute"
  | "builtin"
  | "global-declared"
  | "nonlocal-declared";

type SymbolBase = {
  readonly name: string;
  readonly origin: SymbolOrigin;
};

export type NameSymbol = SymbolBase & { readonly kind: "name" };

export type FunctionSymbol = SymbolBase & {
  readonly kind: "function";
  readonly module: string;
  readonly qualifiedName: string;
  readonly interface: CallInterface;
};

export type ClassSymbol = SymbolBase & {
  readonly kind: "class";
  readonly module: string;
  readonly qualifiedName: string;
};

/**
 * `import a.b` binds `a` with moduleName "a"; `from m import f` binds `f`
 * with moduleName "m" and member "f".
 */
export type ImportSymbol = SymbolBase & {
  readonly kind: "import";
  readonly moduleName: string;
  readonly member: string | undefined;
};

export type BuiltinSymbol = SymbolBase & { readonly kind: "builtin" };

export type ClosureSymbol = SymbolBase & { readonly kind: "closure" };

export type ContextSymbol =
  | NameSymbol
  | FunctionSymbol
  | ClassSymbol
  | ImportSymbol
  | BuiltinSymbol
  | ClosureSymbol;

export const nameSymbol = (name: string, origin: SymbolOrigin): NameSymbol => ({
  kind: "name",
  name,
  origin,
});

export const functionSymbol = (
  name: string,
  module: string,
  qualifiedName: string,
  iface: CallInterface,
  origin: SymbolOrigin = "local-assignment"
): FunctionSymbol => ({
  kind: "function",
  name,
  origin,
  module,
  qualifiedName,
  interface: iface,
});

export const classSymbol = (
  name: string,
  module: string,
  qualifiedName: string
): ClassSymbol => ({
  kind: "class",
  name,
  origin: "local-assignment",
  module,
  qualifiedName,
});

export const importSymbol = (
  name: string,
  moduleName: string,
  member?: string
): ImportSymbol => ({
  kind: "import",
  name,
  origin: "import",
  moduleName,
  member,
});

export const builtinSymbol = (name: string): BuiltinSymbol => ({
  kind: "builtin",
  name,
  origin: "builtin",
});

export const closureSymbol = (name: string): ClosureSymbol => ({
  kind: "closure",
  name,
  origin: "local-assignment",
});

/**
 * Same binding, re-tagged with the origin of the scope that received it
 */
export const withOrigin = <S extends ContextSymbol>(
  symbol: S,
  origin: SymbolOrigin
): S => ({ ...symbol, origin });
