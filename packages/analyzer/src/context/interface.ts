/**
 * Call interfaces read from `parameters` / `lambda_parameters` nodes
 */

import { formatName } from "../naming/format.js";
import type { SyntaxNode } from "../syntax/parser.js";
import { field, namedChildrenOf } from "../syntax/nodes.js";
import {
  emptyInterface,
  parameterNames,
  type CallInterface,
} from "../types/ir.js";
import { declare, type Context } from "./context.js";
import { nameSymbol } from "./symbols.js";

const splatName = (node: SyntaxNode): string =>
  namedChildrenOf(node)[0]?.text ?? "";

export const interfaceOf = (parameters: SyntaxNode | undefined): CallInterface => {
  if (!parameters) {
    return emptyInterface;
  }

  let positional: string[] = [];
  let posonlyargs: string[] = [];
  const kwonlyargs: string[] = [];
  const defaults: Record<string, string> = {};
  let vararg: string | undefined;
  let kwarg: string | undefined;
  let keywordOnly = false;

  const add = (name: string): void => {
    if (keywordOnly) {
      kwonlyargs.push(name);
    } else {
      positional.push(name);
    }
  };

  const addSplat = (node: SyntaxNode): void => {
    if (node.type === "list_splat_pattern") {
      vararg = splatName(node);
      keywordOnly = true;
    } else if (node.type === "dictionary_splat_pattern") {
      kwarg = splatName(node);
    } else {
      add(node.text);
    }
  };

  for (const parameter of namedChildrenOf(parameters)) {
    switch (parameter.type) {
      case "identifier":
        add(parameter.text);
        break;
      case "typed_parameter": {
        const inner = namedChildrenOf(parameter)[0];
        if (inner) {
          addSplat(inner);
        }
        break;
      }
      case "default_parameter":
      case "typed_default_parameter": {
        const name = field(parameter, "name")?.text;
        const value = field(parameter, "value");
        if (name) {
          add(name);
          if (value) {
            defaults[name] = formatName(value).fullname;
          }
        }
        break;
      }
      case "list_splat_pattern":
      case "dictionary_splat_pattern":
        addSplat(parameter);
        break;
      case "keyword_separator":
        keywordOnly = true;
        break;
      case "positional_separator":
        posonlyargs = positional;
        positional = [];
        break;
    }
  }

  return {
    posonlyargs,
    args: positional,
    vararg,
    kwonlyargs,
    kwarg,
    defaults,
  };
};

/**
 * Bind every formal parameter in the current scope
 */
export const declareParameters = (ctx: Context, iface: CallInterface): void => {
  for (const name of parameterNames(iface)) {
    declare(ctx, nameSymbol(name, "parameter"));
  }
};
