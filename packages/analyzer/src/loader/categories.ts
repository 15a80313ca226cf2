/**
 * Module categories: which follow-imports level admits a module
 */

import { readFileSync } from "node:fs";
import type { FollowImportsLevel } from "../types/config.js";
import type { ModuleCategory } from "../types/ir.js";

const STDLIB_FILE = new URL("../../data/python-stdlib.json", import.meta.url);

const loadStdlib = (): ReadonlySet<string> => {
  const data: unknown = JSON.parse(readFileSync(STDLIB_FILE, "utf-8"));
  return new Set(
    Array.isArray(data)
      ? data.filter((name): name is string => typeof name === "string")
      : []
  );
};

export const PYTHON_STDLIB: ReadonlySet<string> = loadStdlib();

const topLevel = (moduleName: string): string => moduleName.split(".")[0] ?? "";

export const isStdlibModule = (moduleName: string): boolean =>
  PYTHON_STDLIB.has(topLevel(moduleName));

const INSTALLED_DIRECTORIES = /[\\/](site|dist)-packages[\\/]/;

export const categorize = (moduleName: string, path: string): ModuleCategory => {
  if (INSTALLED_DIRECTORIES.test(path)) {
    return "pip";
  }
  return isStdlibModule(moduleName) ? "stdlib" : "local";
};

const CATEGORY_LEVEL: Readonly<Record<ModuleCategory, FollowImportsLevel>> = {
  local: 1,
  pip: 2,
  stdlib: 3,
};

export const isFollowed = (
  category: ModuleCategory,
  level: FollowImportsLevel
): boolean => level >= CATEGORY_LEVEL[category];
