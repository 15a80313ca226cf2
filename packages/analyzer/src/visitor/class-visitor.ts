/**
 * Module-level classes: the initialiser and one entry per method
 */

import { declare, withScope } from "../context/context.js";
import { nameSymbol } from "../context/symbols.js";
import type { SyntaxNode } from "../syntax/parser.js";
import {
  boundIdentifiers,
  decoratorName,
  decoratorsOf,
  definitionOf,
  field,
  bodyStatements,
  locationOf,
  namedChildrenOf,
  nameOf,
} from "../syntax/nodes.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { FunctionKind } from "../types/ir.js";
import type { Declaration, ModuleScope } from "./function-visitor.js";

export const INITIALISER = "__init__";

/**
 * Called once per method with its decorators
 */
export type MethodVisitor = (
  declaration: Declaration,
  decorators: readonly SyntaxNode[]
) => void;

const methodKind = (
  name: string,
  decorators: readonly SyntaxNode[]
): FunctionKind => {
  if (name === INITIALISER) {
    return "class";
  }
  const names = decorators.map(decoratorName);
  if (names.includes("staticmethod")) {
    return "staticmethod";
  }
  return names.includes("classmethod") ? "classmethod" : "method";
};

/**
 * Names a class-body statement binds as class attributes
 */
const classAttributes = (statement: SyntaxNode): readonly string[] => {
  if (statement.type !== "expression_statement") {
    return [];
  }
  return namedChildrenOf(statement).flatMap((child) => {
    const names: string[] = [];
    let current: SyntaxNode | undefined = child;
    while (current?.type === "assignment" || current?.type === "augmented_assignment") {
      const left = field(current, "left");
      if (left) {
        names.push(...boundIdentifiers(left));
      }
      current = field(current, "right");
    }
    return names;
  });
};

export const analyseClass = (
  definition: SyntaxNode,
  scope: ModuleScope,
  visitMethod: MethodVisitor
): void => {
  const className = nameOf(definition);
  const statements = bodyStatements(definition);

  withScope(scope.ctx, "class", className, () => {
    for (const statement of statements) {
      for (const attribute of classAttributes(statement)) {
        declare(scope.ctx, nameSymbol(attribute, "class-attribute"));
      }
    }

    for (const statement of statements) {
      const member = definitionOf(statement);
      if (member.type === "class_definition") {
        scope.report(
          createDiagnostic(
            "ATR3004",
            "info",
            `class '${nameOf(member)}' nested in '${className}' is not analysed`,
            locationOf(member, scope.module.path)
          )
        );
        continue;
      }
      if (member.type !== "function_definition") {
        continue;
      }

      const name = nameOf(member);
      const decorators = decoratorsOf(member);
      declare(scope.ctx, nameSymbol(name, "class-attribute"));
      visitMethod(
        {
          node: member,
          qualifiedName: name === INITIALISER ? className : `${className}.${name}`,
          kind: methodKind(name, decorators),
        },
        decorators
      );
    }
  });
};
