/**
 * Module registration pre-pass
 *
 * Binds every top-level name before any function body is visited, so that
 * functions may call each other regardless of definition order.
 */

import { evaluateLiteral, isLiteralList } from "../overrides/literal.js";
import type { SyntaxNode } from "../syntax/parser.js";
import {
  bodyStatements,
  boundIdentifiers,
  decoratorsOf,
  definitionOf,
  field,
  fields,
  locationOf,
  namedChildrenOf,
  nameOf,
  unwrapParens,
} from "../syntax/nodes.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import {
  declare,
  declareName,
  lookup,
  moduleScope,
  type Context,
} from "./context.js";
import { collectDeclarations } from "./declarations.js";
import {
  IMPORT_STATEMENTS,
  declareImports,
  type ImportingModule,
  type StarExpander,
} from "./imports.js";
import { interfaceOf } from "./interface.js";
import { classSymbol, functionSymbol } from "./symbols.js";

export type TopLevelDefinition = {
  readonly kind: "function" | "class" | "lambda";
  readonly name: string;
  readonly node: SyntaxNode;
  readonly decorators: readonly SyntaxNode[];
};

export type ModuleRegistration = {
  /** In source order; a redefinition replaces the earlier entry */
  readonly definitions: readonly TopLevelDefinition[];
  readonly exports: readonly string[];
};

export type RegistrationScope = {
  readonly ctx: Context;
  readonly module: ImportingModule;
  readonly report: (diagnostic: Diagnostic) => void;
  readonly expandStar: StarExpander;
};

/**
 * Statements whose blocks still belong to the module scope
 */
const COMPOUND_STATEMENTS = new Set([
  "if_statement",
  "elif_clause",
  "else_clause",
  "try_statement",
  "except_clause",
  "except_group_clause",
  "finally_clause",
  "with_statement",
  "for_statement",
  "while_statement",
  "match_statement",
  "case_clause",
  "block",
]);

const ALL = "__all__";

/**
 * `__all__ = ["a", "b"]` when it is a literal list of strings
 */
const literalAll = (assignment: SyntaxNode): readonly string[] | undefined => {
  const left = field(assignment, "left");
  const right = field(assignment, "right");
  if (left?.type !== "identifier" || left.text !== ALL || !right) {
    return undefined;
  }
  const value = evaluateLiteral(right);
  if (!value.ok || !isLiteralList(value.value)) {
    return undefined;
  }
  const names = value.value.filter(
    (name): name is string => typeof name === "string"
  );
  return names.length === value.value.length ? names : undefined;
};

/**
 * Names declared `global` inside a function become module names
 */
const declareGlobalsOf = (
  scope: RegistrationScope,
  definition: SyntaxNode
): void => {
  for (const name of collectDeclarations(bodyStatements(definition)).globals) {
    if (!moduleScope(scope.ctx).symbols.has(name)) {
      declareName(scope.ctx, name, "global-declared");
    }
  }
};

/**
 * Names bound by `with ... as x` and `except E as x` on one statement
 */
const asTargets = (statement: SyntaxNode): readonly string[] => {
  const patterns = namedChildrenOf(statement).flatMap((child) => {
    if (child.type === "as_pattern") {
      return [child];
    }
    if (child.type !== "with_clause") {
      return [];
    }
    return namedChildrenOf(child).flatMap((item) => {
      const value = field(item, "value");
      return value?.type === "as_pattern" ? [value] : [];
    });
  });
  const aliases = [
    ...patterns.flatMap((pattern) => fields(pattern, "alias")),
    ...fields(statement, "alias"),
  ];
  return aliases.flatMap((alias) =>
    alias.type === "as_pattern_target"
      ? namedChildrenOf(alias).flatMap(boundIdentifiers)
      : boundIdentifiers(alias)
  );
};

export const registerModuleSymbols = (
  root: SyntaxNode,
  scope: RegistrationScope
): ModuleRegistration => {
  const { ctx, module } = scope;
  const definitions = new Map<string, TopLevelDefinition>();
  let exported: readonly string[] | undefined;

  const define = (definition: TopLevelDefinition): void => {
    const previous = lookup(ctx, definition.name);
    if (
      definitions.has(definition.name) &&
      (previous?.kind === "function" || previous?.kind === "class")
    ) {
      scope.report(
        createDiagnostic(
          "ATR2002",
          "warning",
          `'${definition.name}' redefined at module level, the last definition is used`,
          locationOf(definition.node, module.path)
        )
      );
      definitions.delete(definition.name);
    }
    definitions.set(definition.name, definition);
  };

  const registerAssignment = (assignment: SyntaxNode): void => {
    exported = literalAll(assignment) ?? exported;

    const left = field(assignment, "left");
    const right = field(assignment, "right");
    const value = right ? unwrapParens(right) : undefined;

    if (left?.type === "identifier" && value?.type === "lambda") {
      declare(
        ctx,
        functionSymbol(
          left.text,
          module.moduleName,
          left.text,
          interfaceOf(field(value, "parameters"))
        )
      );
      define({ kind: "lambda", name: left.text, node: value, decorators: [] });
      return;
    }

    if (left) {
      boundIdentifiers(left).forEach((name) => declareName(ctx, name));
    }
    if (value?.type === "assignment") {
      registerAssignment(value);
    }
  };

  const register = (statement: SyntaxNode): void => {
    if (IMPORT_STATEMENTS.has(statement.type)) {
      declareImports(ctx, statement, module, scope.expandStar);
      return;
    }

    const definition = definitionOf(statement);
    if (definition.type === "function_definition") {
      const name = nameOf(definition);
      declare(
        ctx,
        functionSymbol(
          name,
          module.moduleName,
          name,
          interfaceOf(field(definition, "parameters"))
        )
      );
      declareGlobalsOf(scope, definition);
      define({
        kind: "function",
        name,
        node: definition,
        decorators: decoratorsOf(definition),
      });
      return;
    }
    if (definition.type === "class_definition") {
      const name = nameOf(definition);
      declare(ctx, classSymbol(name, module.moduleName, name));
      for (const member of bodyStatements(definition)) {
        const method = definitionOf(member);
        if (method.type === "function_definition") {
          declareGlobalsOf(scope, method);
        }
      }
      define({
        kind: "class",
        name,
        node: definition,
        decorators: decoratorsOf(definition),
      });
      return;
    }

    if (statement.type === "expression_statement") {
      for (const child of namedChildrenOf(statement)) {
        if (child.type === "assignment") {
          registerAssignment(child);
        } else if (child.type === "augmented_assignment") {
          const left = field(child, "left");
          if (left) {
            boundIdentifiers(left).forEach((name) => declareName(ctx, name));
          }
        }
      }
      return;
    }

    if (!COMPOUND_STATEMENTS.has(statement.type)) {
      return;
    }

    if (statement.type === "for_statement") {
      const left = field(statement, "left");
      if (left) {
        boundIdentifiers(left).forEach((name) => declareName(ctx, name));
      }
    }
    asTargets(statement).forEach((name) => declareName(ctx, name));
    namedChildrenOf(statement).forEach(register);
  };

  namedChildrenOf(root).forEach(register);

  const exports =
    exported ??
    [...moduleScope(ctx).symbols.keys()].filter((name) => !name.startsWith("_"));

  return { definitions: [...definitions.values()], exports };
};

/**
 * Public names of a module, for star imports
 */
export const moduleExports = (
  root: SyntaxNode,
  scope: RegistrationScope
): readonly string[] => registerModuleSymbols(root, scope).exports;
