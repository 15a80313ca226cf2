/**
 * Name Formatter - renders access expressions into canonical names
 *
 * Total: every node renders. Nodes with no stable name become `@Kind` and
 * are handed back as sub-accesses for the visitor to walk.
 */

import type { SyntaxNode } from "../syntax/parser.js";
import { field, fields, namedChildrenOf, stringValue } from "../syntax/nodes.js";
import { kindTag } from "./kinds.js";
import { LOCAL_VALUE_PREFIX } from "./names.js";

export type FormattedName = {
  readonly basename: string;
  readonly fullname: string;
  /** Expressions the name dominates that must be visited as gets */
  readonly subAccesses: readonly SyntaxNode[];
  /** Calls inside the chain (not the node itself), innermost first */
  readonly calls: readonly SyntaxNode[];
};

const leaf = (name: string): FormattedName => ({
  basename: name,
  fullname: name,
  subAccesses: [],
  calls: [],
});

const extend = (
  base: FormattedName,
  suffix: string,
  subAccesses: readonly SyntaxNode[] = []
): FormattedName => ({
  basename: base.basename,
  fullname: `${base.fullname}${suffix}`,
  subAccesses: [...base.subAccesses, ...subAccesses],
  calls: base.calls,
});

const synthesized = (node: SyntaxNode): FormattedName => ({
  basename: `${LOCAL_VALUE_PREFIX}${kindTag(node.type)}`,
  fullname: `${LOCAL_VALUE_PREFIX}${kindTag(node.type)}`,
  subAccesses: [node],
  calls: [],
});

/**
 * Positional arguments of a call, excluding keyword arguments and splats
 */
export const positionalArguments = (call: SyntaxNode): readonly SyntaxNode[] => {
  const args = field(call, "arguments");
  if (!args || args.type !== "argument_list") {
    return args ? [args] : [];
  }
  return namedChildrenOf(args).filter(
    (arg) => arg.type !== "keyword_argument" && arg.type !== "dictionary_splat"
  );
};

/**
 * `getattr(obj, "attr")` with a plain identifier callee, or undefined
 */
export const getattrParts = (
  call: SyntaxNode
): { readonly object: SyntaxNode; readonly attribute: SyntaxNode } | undefined => {
  const callee = field(call, "function");
  if (!callee || callee.type !== "identifier" || callee.text !== "getattr") {
    return undefined;
  }
  const [object, attribute] = positionalArguments(call);
  return object && attribute ? { object, attribute } : undefined;
};

/**
 * `attr` for a string literal, `<name>` placeholder otherwise
 */
export const dynamicAttribute = (node: SyntaxNode): string =>
  stringValue(node) ?? `<${formatName(node).fullname}>`;

const render = (node: SyntaxNode, top: boolean): FormattedName => {
  switch (node.type) {
    case "identifier":
      return leaf(node.text);

    case "parenthesized_expression": {
      const inner = namedChildrenOf(node)[0];
      return inner ? render(inner, top) : synthesized(node);
    }

    case "attribute": {
      const object = field(node, "object");
      const attribute = field(node, "attribute");
      if (!object || !attribute) {
        return synthesized(node);
      }
      return extend(render(object, false), `.${attribute.text}`);
    }

    case "subscript": {
      const value = field(node, "value");
      if (!value) {
        return synthesized(node);
      }
      return extend(render(value, false), "[]", fields(node, "subscript"));
    }

    case "call": {
      const xattr = getattrParts(node);
      if (xattr) {
        const object = render(xattr.object, false);
        const literal = stringValue(xattr.attribute) !== undefined;
        return extend(
          object,
          `.${dynamicAttribute(xattr.attribute)}`,
          literal ? [] : [xattr.attribute]
        );
      }

      const callee = field(node, "function");
      if (!callee) {
        return synthesized(node);
      }
      const rendered = extend(render(callee, false), "()");
      if (top) {
        return rendered;
      }
      // A call inside a chain is visited as its own call event
      return {
        basename: rendered.basename,
        fullname: rendered.fullname,
        subAccesses: [],
        calls: [node],
      };
    }

    case "list_splat":
    case "list_splat_pattern":
    case "dictionary_splat":
    case "dictionary_splat_pattern": {
      const inner = namedChildrenOf(node)[0];
      if (!inner) {
        return synthesized(node);
      }
      const stars = node.type.startsWith("dictionary") ? "**" : "*";
      const rendered = render(inner, false);
      return { ...rendered, fullname: `${stars}${rendered.fullname}` };
    }

    default:
      return synthesized(node);
  }
};

export const formatName = (node: SyntaxNode): FormattedName => render(node, true);
