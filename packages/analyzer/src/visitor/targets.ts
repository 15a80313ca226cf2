/**
 * Call targets as seen from the Context at the call site
 */

import { resolve, type Context } from "../context/context.js";
import { createDiagnostic, type SourceLocation } from "../types/diagnostic.js";
import type { CallTarget } from "../types/ir.js";
import {
  basenameOf,
  isMethodOnConstant,
  isSynthesized,
  withoutCallBrackets,
} from "../naming/names.js";

/**
 * Dotted attribute path after the root, when the callee is a plain chain:
 * `a.b.c()` gives "b.c", `a()` gives "", `a[].b()` gives undefined
 */
const memberPath = (fullname: string): string | undefined => {
  const callee = withoutCallBrackets(fullname);
  const rest = callee.slice(basenameOf(callee).length);
  if (rest === "") {
    return "";
  }
  return /^(\.[A-Za-z_][A-Za-z0-9_]*)+$/.test(rest) ? rest.slice(1) : undefined;
};

export const callTargetFor = (
  ctx: Context,
  fullname: string,
  location: SourceLocation
): CallTarget => {
  const basename = basenameOf(fullname);

  if (fullname.startsWith("*") || isSynthesized(fullname)) {
    if (!isMethodOnConstant(fullname)) {
      ctx.report(
        createDiagnostic(
          "ATR3007",
          "info",
          `call to '${fullname}' has no static target`,
          location
        )
      );
    }
    return { kind: "method", name: fullname };
  }

  const symbol = resolve(ctx, basename, location);
  if (!symbol) {
    return { kind: "unresolved", name: fullname };
  }

  const member = memberPath(fullname);

  if (member === "") {
    switch (symbol.kind) {
      case "function":
        return {
          kind: "function",
          module: symbol.module,
          qualifiedName: symbol.qualifiedName,
        };
      case "class":
        return {
          kind: "class",
          module: symbol.module,
          qualifiedName: symbol.qualifiedName,
        };
      case "import":
        return {
          kind: "import",
          moduleName: symbol.moduleName,
          member: symbol.member,
        };
      case "builtin":
        return { kind: "builtin", name: symbol.name };
      case "closure":
        return { kind: "closure", name: symbol.name };
      case "name":
        ctx.report(
          createDiagnostic(
            "ATR3006",
            "warning",
            `unable to resolve call to '${fullname}', likely a procedural parameter or local value`,
            location
          )
        );
        return { kind: "local", name: symbol.name };
    }
  }

  if (member !== undefined && symbol.kind === "import") {
    return {
      kind: "import",
      moduleName: symbol.moduleName,
      member: symbol.member !== undefined ? `${symbol.member}.${member}` : member,
    };
  }

  if (member !== undefined && symbol.kind === "class") {
    return {
      kind: "function",
      module: symbol.module,
      qualifiedName: `${symbol.qualifiedName}.${member}`,
    };
  }

  ctx.report(
    createDiagnostic(
      "ATR3007",
      "info",
      `method call '${fullname}' has no static target`,
      location
    )
  );
  return { kind: "method", name: fullname };
};
