/**
 * Function analysis: one FunctionRecord per top-level def, method or lambda
 */

import { withScope, type Context } from "../context/context.js";
import { applyDeclarations } from "../context/declarations.js";
import type { StarExpander } from "../context/imports.js";
import { declareParameters, interfaceOf } from "../context/interface.js";
import type { ExplicitResults } from "../overrides/decide.js";
import type { SyntaxNode } from "../syntax/parser.js";
import { bodyStatements, field, locationOf } from "../syntax/nodes.js";
import type { Diagnostic } from "../types/diagnostic.js";
import {
  createFunctionIR,
  type CallInterface,
  type FunctionKind,
  type FunctionRecord,
} from "../types/ir.js";
import { visitExpression } from "./expressions.js";
import {
  createBuilder,
  toFunctionIR,
  type ModuleInfo,
  type VisitorState,
} from "./state.js";
import { visitBody } from "./statements.js";
import { callTargetFor } from "./targets.js";

/**
 * What every declaration in one module is analysed against
 */
export type ModuleScope = {
  readonly ctx: Context;
  readonly module: ModuleInfo;
  readonly report: (diagnostic: Diagnostic) => void;
  readonly expandStar: StarExpander;
};

export type Declaration = {
  readonly node: SyntaxNode;
  readonly qualifiedName: string;
  readonly kind: FunctionKind;
};

export const interfaceOfDeclaration = (node: SyntaxNode): CallInterface =>
  interfaceOf(field(node, "parameters"));

export const analyseFunction = (
  declaration: Declaration,
  scope: ModuleScope
): FunctionRecord => {
  const { node, qualifiedName, kind } = declaration;
  const iface = interfaceOfDeclaration(node);
  const builder = createBuilder();

  withScope(scope.ctx, "function", qualifiedName, () => {
    const state: VisitorState = {
      ctx: scope.ctx,
      ir: builder,
      module: scope.module,
      report: scope.report,
      expandStar: scope.expandStar,
      owner: qualifiedName,
      closureDepth: 0,
    };
    declareParameters(scope.ctx, iface);

    if (node.type === "lambda") {
      const body = field(node, "body");
      if (body) {
        visitExpression(body, state);
      }
      return;
    }

    const body = bodyStatements(node);
    applyDeclarations(scope.ctx, body);
    visitBody(body, state);
  });

  return {
    qualifiedName,
    kind,
    interface: iface,
    ir: toFunctionIR(builder),
    location: locationOf(node, scope.module.path),
  };
};

/**
 * Record for a results override; call targets are resolved in the module
 * scope as if the calls had been written there
 */
export const explicitFunction = (
  declaration: Declaration,
  results: ExplicitResults,
  scope: ModuleScope
): FunctionRecord => {
  const location = locationOf(declaration.node, scope.module.path);
  const calls = results.calls.map((call) => ({
    ...call,
    target: callTargetFor(scope.ctx, call.name, location),
    location,
  }));

  return {
    qualifiedName: declaration.qualifiedName,
    kind: declaration.kind,
    interface: interfaceOfDeclaration(declaration.node),
    ir: createFunctionIR({ ...results, calls }),
    location,
  };
};
