/**
 * Module search paths from a Python interpreter's sys.path
 */

import { spawnSync } from "node:child_process";
import { isAbsolute } from "node:path";
import { error, ok, type Result } from "../types/result.js";

export const DEFAULT_PYTHON = "python3";

const SYS_PATH_SCRIPT = "import sys,json;print(json.dumps(sys.path))";

/**
 * Run `python` with `args` and return its stdout
 */
export type InterpreterRunner = (
  python: string,
  args: readonly string[]
) => Result<string, string>;

export const runInterpreter: InterpreterRunner = (python, args) => {
  const result = spawnSync(python, args, { encoding: "utf-8" });

  if (result.error) {
    return error(`Failed to execute ${python}: ${result.error.message}`);
  }

  if (result.status !== 0) {
    const stderr = result.stderr.trim();
    return error(
      `${python} exited with code ${result.status}${stderr ? `: ${stderr}` : ""}`
    );
  }

  return ok(result.stdout);
};

/**
 * Directories of a JSON-encoded sys.path. The empty entry (the current
 * directory) and relative entries are dropped.
 */
export const parseSysPath = (stdout: string): Result<readonly string[], string> => {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (e) {
    return error(`Unreadable sys.path: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (!Array.isArray(data) || !data.every((entry) => typeof entry === "string")) {
    return error("Unreadable sys.path: expected an array of strings");
  }

  return ok(
    data.filter(
      (entry): entry is string => typeof entry === "string" && isAbsolute(entry)
    )
  );
};

/**
 * Search paths the interpreter itself would import from: the standard
 * library and its site-packages directories, in sys.path order
 */
export const interpreterSearchPaths = (
  python: string = DEFAULT_PYTHON,
  run: InterpreterRunner = runInterpreter
): Result<readonly string[], string> => {
  const output = run(python, ["-c", SYS_PATH_SCRIPT]);
  return output.ok ? parseSysPath(output.value) : output;
};
