/**
 * Import statements: bindings they introduce and modules they reference
 */

import type { SyntaxNode } from "../syntax/parser.js";
import { field, fields, locationOf, namedChildrenOf } from "../syntax/nodes.js";
import type { SourceLocation } from "../types/diagnostic.js";
import type { ImportReference } from "../types/ir.js";
import { declare, type Context } from "./context.js";
import { importSymbol } from "./symbols.js";

export type ImportingModule = {
  readonly path: string;
  readonly moduleName: string;
  readonly isPackage: boolean;
};

/**
 * Public names of a star-imported module
 */
export type StarExpander = (
  moduleName: string,
  location: SourceLocation
) => readonly string[];

export type ImportBinding = {
  readonly name: string;
  readonly moduleName: string;
  readonly member: string | undefined;
};

export type ImportStatement = {
  readonly bindings: readonly ImportBinding[];
  /** Modules whose public names a `*` import binds */
  readonly stars: readonly string[];
  readonly references: readonly ImportReference[];
};

const EMPTY: ImportStatement = { bindings: [], stars: [], references: [] };

export const IMPORT_STATEMENTS = new Set([
  "import_statement",
  "import_from_statement",
]);

/**
 * Absolute name of `from <dots><name> import ...` seen from `module`, or
 * undefined when the dots climb above the top-level package
 */
export const resolveRelativeModule = (
  module: ImportingModule,
  level: number,
  name: string
): string | undefined => {
  const parts = module.moduleName.split(".").filter((part) => part !== "");
  const packageParts = module.isPackage ? parts : parts.slice(0, -1);
  const climb = level - 1;
  if (climb > packageParts.length || (climb === packageParts.length && !name)) {
    return undefined;
  }
  const base = packageParts.slice(0, packageParts.length - climb);
  return [...base, ...(name ? name.split(".") : [])].join(".");
};

const reference = (
  moduleName: string,
  relative: boolean,
  optional: boolean,
  location: SourceLocation
): ImportReference => ({ moduleName, relative, optional, location });

const parseImport = (
  node: SyntaxNode,
  module: ImportingModule
): ImportStatement => {
  const location = locationOf(node, module.path);
  const bindings: ImportBinding[] = [];
  const references: ImportReference[] = [];

  for (const child of namedChildrenOf(node)) {
    if (child.type === "dotted_name") {
      // `import a.b` binds `a`
      const root = child.text.split(".")[0] ?? child.text;
      bindings.push({ name: root, moduleName: root, member: undefined });
      references.push(reference(child.text, false, false, location));
    } else if (child.type === "aliased_import") {
      const name = field(child, "name")?.text;
      const alias = field(child, "alias")?.text;
      if (name && alias) {
        bindings.push({ name: alias, moduleName: name, member: undefined });
        references.push(reference(name, false, false, location));
      }
    }
  }

  return { bindings, stars: [], references };
};

const parseImportFrom = (
  node: SyntaxNode,
  module: ImportingModule
): ImportStatement => {
  const location = locationOf(node, module.path);
  const source = field(node, "module_name")?.text ?? "";
  const level = source.length - source.replace(/^\.+/, "").length;
  const relative = level > 0;
  const resolved = relative
    ? resolveRelativeModule(module, level, source.slice(level))
    : source;

  if (resolved === "") {
    return EMPTY;
  }

  // Unresolvable relative imports keep their dotted source so the loader
  // can report them; their names stay foreign
  const moduleName = resolved ?? source;
  const bindings: ImportBinding[] = [];
  const references: ImportReference[] = [
    reference(moduleName, relative, false, location),
  ];

  for (const imported of fields(node, "name")) {
    const name =
      imported.type === "aliased_import"
        ? field(imported, "name")?.text
        : imported.text;
    const alias =
      imported.type === "aliased_import" ? field(imported, "alias")?.text : name;
    if (!name || !alias) {
      continue;
    }
    bindings.push({ name: alias, moduleName, member: name });
    // `from pkg import sub` may name a submodule
    if (resolved !== undefined) {
      references.push(reference(`${moduleName}.${name}`, relative, true, location));
    }
  }

  const stars =
    resolved !== undefined &&
    namedChildrenOf(node).some((child) => child.type === "wildcard_import")
      ? [moduleName]
      : [];

  return { bindings, stars, references };
};

export const parseImportStatement = (
  node: SyntaxNode,
  module: ImportingModule
): ImportStatement => {
  switch (node.type) {
    case "import_statement":
      return parseImport(node, module);
    case "import_from_statement":
      return parseImportFrom(node, module);
    default:
      return EMPTY;
  }
};

/**
 * Bind the names of an import statement in the current scope
 */
export const declareImports = (
  ctx: Context,
  node: SyntaxNode,
  module: ImportingModule,
  expandStar: StarExpander
): ImportStatement => {
  const statement = parseImportStatement(node, module);
  for (const binding of statement.bindings) {
    declare(ctx, importSymbol(binding.name, binding.moduleName, binding.member));
  }
  for (const star of statement.stars) {
    for (const name of expandStar(star, locationOf(node, module.path))) {
      declare(ctx, importSymbol(name, star, name));
    }
  }
  return statement;
};

/**
 * Every import statement in a tree, including those inside functions
 */
export const collectImportReferences = (
  root: SyntaxNode,
  module: ImportingModule
): readonly ImportReference[] => {
  const references: ImportReference[] = [];
  const stack = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) {
      continue;
    }
    if (IMPORT_STATEMENTS.has(node.type)) {
      references.push(...parseImportStatement(node, module).references);
      continue;
    }
    stack.push(...namedChildrenOf(node).slice().reverse());
  }
  return references;
};
