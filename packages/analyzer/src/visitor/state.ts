/**
 * Visitor state - the Context plus the IR being accumulated
 */

import type { Context } from "../context/context.js";
import type { ImportingModule, StarExpander } from "../context/imports.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { CallSite, FunctionIR } from "../types/ir.js";
import { createFunctionIR } from "../types/ir.js";

export type IrBuilder = {
  readonly gets: Set<string>;
  readonly sets: Set<string>;
  readonly dels: Set<string>;
  readonly calls: CallSite[];
};

export type ModuleInfo = ImportingModule;

export type VisitorState = {
  readonly ctx: Context;
  readonly ir: IrBuilder;
  readonly module: ModuleInfo;
  readonly report: (diagnostic: Diagnostic) => void;
  readonly expandStar: StarExpander;
  /** Qualified name of the function being visited, for messages */
  readonly owner: string;
  /** 0 for a module-level function or method, +1 per enclosing closure */
  readonly closureDepth: number;
};

export const createBuilder = (): IrBuilder => ({
  gets: new Set(),
  sets: new Set(),
  dels: new Set(),
  calls: [],
});

export const toFunctionIR = (builder: IrBuilder): FunctionIR =>
  createFunctionIR(builder);

export type AccessMode = "get" | "set" | "del";

export const record = (ir: IrBuilder, mode: AccessMode, name: string): void => {
  switch (mode) {
    case "get":
      ir.gets.add(name);
      break;
    case "set":
      ir.sets.add(name);
      break;
    case "del":
      ir.dels.add(name);
      break;
  }
};

export const withBuilder = (
  state: VisitorState,
  ir: IrBuilder,
  nested = false
): VisitorState => ({
  ...state,
  ir,
  closureDepth: nested ? state.closureDepth + 1 : state.closureDepth,
});
