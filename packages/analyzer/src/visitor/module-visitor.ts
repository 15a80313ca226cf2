/**
 * Module visitor - raw Module IR for one parsed file
 *
 * Registration binds every top-level name first; each top-level function,
 * class and lambda is then visited once. Calls are recorded as raw edges and
 * never descended into, so recursion needs no special handling here.
 */

import { createContext, moduleScope } from "../context/context.js";
import {
  collectImportReferences,
  type StarExpander,
} from "../context/imports.js";
import { registerModuleSymbols } from "../context/module-symbols.js";
import { decideOverride } from "../overrides/decide.js";
import type { SyntaxNode } from "../syntax/parser.js";
import type { AnalyzerConfig } from "../types/config.js";
import { matchesAny } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type {
  FunctionRecord,
  ModuleCategory,
  ModuleIR,
} from "../types/ir.js";
import { analyseClass } from "./class-visitor.js";
import {
  analyseFunction,
  explicitFunction,
  type Declaration,
  type ModuleScope,
} from "./function-visitor.js";
import type { ModuleInfo } from "./state.js";

export type ModuleVisitOptions = {
  readonly module: ModuleInfo;
  readonly category: ModuleCategory;
  readonly config: AnalyzerConfig;
  readonly report: (diagnostic: Diagnostic) => void;
  readonly expandStar: StarExpander;
};

export const visitModule = (
  root: SyntaxNode,
  options: ModuleVisitOptions
): ModuleIR => {
  const { module, config, report, expandStar } = options;
  const ctx = createContext(module.path, report);
  const scope: ModuleScope = { ctx, module, report, expandStar };

  const registration = registerModuleSymbols(root, scope);
  const functions = new Map<string, FunctionRecord>();
  const ignored = new Set<string>();

  const isExcluded = (qualifiedName: string): boolean => {
    if (matchesAny(config.excludeNames, qualifiedName)) {
      ignored.add(qualifiedName);
      return true;
    }
    return false;
  };

  const analyseDeclaration = (
    declaration: Declaration,
    decorators: readonly SyntaxNode[]
  ): void => {
    if (isExcluded(declaration.qualifiedName)) {
      return;
    }
    const decision = decideOverride(decorators, module.path, report);
    switch (decision.kind) {
      case "ignore":
        ignored.add(declaration.qualifiedName);
        return;
      case "results":
        functions.set(
          declaration.qualifiedName,
          explicitFunction(declaration, decision.results, scope)
        );
        return;
      case "normal":
        functions.set(
          declaration.qualifiedName,
          analyseFunction(declaration, scope)
        );
        return;
    }
  };

  for (const definition of registration.definitions) {
    switch (definition.kind) {
      case "function":
        analyseDeclaration(
          { node: definition.node, qualifiedName: definition.name, kind: "function" },
          definition.decorators
        );
        break;
      case "lambda":
        analyseDeclaration(
          { node: definition.node, qualifiedName: definition.name, kind: "lambda" },
          []
        );
        break;
      case "class": {
        if (isExcluded(definition.name)) {
          break;
        }
        const decision = decideOverride(definition.decorators, module.path, report);
        if (decision.kind === "ignore") {
          ignored.add(definition.name);
          break;
        }
        analyseClass(definition.node, scope, analyseDeclaration);
        break;
      }
    }
  }

  return {
    path: module.path,
    moduleName: module.moduleName,
    category: options.category,
    functions,
    symbols: new Map(moduleScope(ctx).symbols),
    exports: registration.exports,
    imports: collectImportReferences(root, module),
    ignored,
  };
};
