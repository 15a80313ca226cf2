/**
 * In-memory module source provider, keyed by absolute path
 */

import { resolve } from "node:path";
import { error, ok } from "../types/result.js";
import {
  createModuleSourceProvider,
  type ModuleSourceProvider,
} from "./provider.js";

export const createInMemoryProvider = (
  files: Readonly<Record<string, string>>,
  searchPaths: readonly string[] = []
): ModuleSourceProvider => {
  const sources = new Map(
    Object.entries(files).map(([path, source]) => [resolve(path), source])
  );
  return createModuleSourceProvider(
    {
      isFile: (path) => sources.has(path),
      readText: (path) => {
        const source = sources.get(path);
        return source !== undefined ? ok(source) : error(`No such file: ${path}`);
      },
    },
    searchPaths
  );
};
