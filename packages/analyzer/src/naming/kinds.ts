/**
 * Synthesized kind tags for expressions with no stable name
 */

const KIND_TAGS: Readonly<Record<string, string>> = {
  binary_operator: "BinaryOp",
  unary_operator: "UnaryOp",
  not_operator: "UnaryOp",
  boolean_operator: "BoolOp",
  comparison_operator: "Compare",
  string: "Constant",
  concatenated_string: "Constant",
  integer: "Constant",
  float: "Constant",
  true: "Constant",
  false: "Constant",
  none: "Constant",
  ellipsis: "Constant",
  list: "List",
  tuple: "Tuple",
  dictionary: "Dict",
  set: "Set",
  list_comprehension: "ListComp",
  set_comprehension: "SetComp",
  dictionary_comprehension: "DictComp",
  generator_expression: "GeneratorExp",
  lambda: "Lambda",
  conditional_expression: "IfExp",
  await: "Await",
  named_expression: "NamedExpr",
  yield: "Yield",
  slice: "Slice",
};

const pascalCase = (type: string): string =>
  type
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");

export const kindTag = (nodeType: string): string =>
  KIND_TAGS[nodeType] ?? (pascalCase(nodeType) || "Expr");
