/**
 * Python builtin names, loaded from data/python-builtins.json
 */

import { readFileSync } from "node:fs";

const BUILTINS_FILE = new URL("../../data/python-builtins.json", import.meta.url);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const readGroup = (data: unknown, group: string): readonly string[] => {
  if (typeof data !== "object" || data === null || !(group in data)) {
    return [];
  }
  const value: unknown = Reflect.get(data, group);
  return isStringArray(value) ? value : [];
};

const loadBuiltins = (): ReadonlySet<string> => {
  const data: unknown = JSON.parse(readFileSync(BUILTINS_FILE, "utf-8"));
  return new Set([
    ...readGroup(data, "functions"),
    ...readGroup(data, "constants"),
    ...readGroup(data, "exceptions"),
  ]);
};

export const PYTHON_BUILTINS: ReadonlySet<string> = loadBuiltins();
