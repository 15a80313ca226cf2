/**
 * Call target resolution across the loaded program
 */

import type {
  CallTarget,
  FunctionRecord,
  ModuleIR,
  Program,
} from "../types/ir.js";

/**
 * Imports re-exported through more modules than this resolve as opaque
 */
const MAX_REEXPORT_DEPTH = 8;

export type ResolvedCallee = {
  readonly key: string;
  readonly module: ModuleIR;
  readonly record: FunctionRecord;
};

export const functionKey = (path: string, qualifiedName: string): string =>
  `${path}#${qualifiedName}`;

const moduleByName = (program: Program, moduleName: string): ModuleIR | undefined => {
  const path = program.moduleNames.get(moduleName);
  return path !== undefined ? program.modules.get(path) : undefined;
};

/**
 * True when `qualifiedName` or an enclosing class of it is ignored
 */
const isIgnored = (module: ModuleIR, qualifiedName: string): boolean => {
  const parts = qualifiedName.split(".");
  return parts.some((_, i) => module.ignored.has(parts.slice(0, i + 1).join(".")));
};

const inModule = (
  module: ModuleIR,
  qualifiedName: string
): ResolvedCallee | undefined => {
  if (isIgnored(module, qualifiedName)) {
    return undefined;
  }
  const record = module.functions.get(qualifiedName);
  return record
    ? { key: functionKey(module.path, qualifiedName), module, record }
    : undefined;
};

/**
 * Resolve `dotted` (module path plus member path) through the longest
 * loaded module prefix, following re-exported imports
 */
const resolveDotted = (
  program: Program,
  dotted: string,
  depth: number
): ResolvedCallee | undefined => {
  if (depth > MAX_REEXPORT_DEPTH) {
    return undefined;
  }
  const parts = dotted.split(".");

  for (let split = parts.length - 1; split >= 1; split--) {
    const module = moduleByName(program, parts.slice(0, split).join("."));
    if (!module) {
      continue;
    }
    const member = parts.slice(split);
    const [head, ...tail] = member;
    const symbol = head !== undefined ? module.symbols.get(head) : undefined;

    switch (symbol?.kind) {
      case "function":
      case "class":
        return inModule(module, [symbol.qualifiedName, ...tail].join("."));
      case "import": {
        const reexported = [
          symbol.moduleName,
          ...(symbol.member !== undefined ? [symbol.member] : []),
          ...tail,
        ].join(".");
        return resolveDotted(program, reexported, depth + 1);
      }
      default:
        return inModule(module, member.join("."));
    }
  }
  return undefined;
};

/**
 * Function record a call target denotes, or undefined for an opaque call
 */
export const resolveCallTarget = (
  program: Program,
  target: CallTarget
): ResolvedCallee | undefined => {
  switch (target.kind) {
    case "function":
    case "class": {
      const module = moduleByName(program, target.module);
      return module ? inModule(module, target.qualifiedName) : undefined;
    }
    case "import":
      return resolveDotted(
        program,
        target.member !== undefined
          ? `${target.moduleName}.${target.member}`
          : target.moduleName,
        0
      );
    default:
      return undefined;
  }
};
