/**
 * Python parser backed by web-tree-sitter and the tree-sitter-python grammar
 */

import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import Parser from "web-tree-sitter";
import { error, ok, type Result } from "../types/result.js";

export type SyntaxNode = Parser.SyntaxNode;
export type SyntaxTree = Parser.Tree;

export type PythonParser = {
  readonly parse: (source: string) => SyntaxTree;
};

let parserInit: Promise<void> | undefined;

/**
 * Parser.init() runs once per process; later calls share the same promise
 */
export const ensureParserInit = (): Promise<void> => {
  if (!parserInit) {
    parserInit = Parser.init();
  }
  return parserInit;
};

/**
 * Location of the WASM grammar shipped with the tree-sitter-python package
 */
export const defaultGrammarPath = (): string => {
  const require = createRequire(import.meta.url);
  try {
    return join(
      dirname(require.resolve("tree-sitter-python/package.json")),
      "tree-sitter-python.wasm"
    );
  } catch {
    // Main entry is bindings/node/index.js, two levels below the package root
    const main = require.resolve("tree-sitter-python");
    return join(dirname(main), "..", "..", "tree-sitter-python.wasm");
  }
};

export const createPythonParser = async (
  grammarPath: string = defaultGrammarPath()
): Promise<Result<PythonParser, string>> => {
  await ensureParserInit();

  try {
    const language = await Parser.Language.load(grammarPath);
    const parser = new Parser();
    parser.setLanguage(language);
    return ok({ parse: (source: string) => parser.parse(source) });
  } catch (e) {
    return error(
      `Unable to load Python grammar from ${grammarPath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
};

/**
 * First ERROR node or missing (zero-width) token in the tree, if any
 */
export const findSyntaxError = (root: SyntaxNode): SyntaxNode | undefined => {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) {
      break;
    }
    if (node.type === "ERROR") {
      return node;
    }
    if (
      node.childCount === 0 &&
      node.startIndex === node.endIndex &&
      node.id !== root.id
    ) {
      return node;
    }
    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) {
        stack.push(child);
      }
    }
  }
  return undefined;
};
