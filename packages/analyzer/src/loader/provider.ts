/**
 * Module source providers: locate a module by name and read its source
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { basename, dirname, join, relative, resolve, sep } from "node:path";
import type { ModuleCategory } from "../types/ir.js";
import { error, ok, type Result } from "../types/result.js";
import { categorize } from "./categories.js";

export type ModuleLocation = {
  /** Canonical absolute path, the memoization key */
  readonly path: string;
  readonly moduleName: string;
  readonly category: ModuleCategory;
  readonly isPackage: boolean;
};

export type ModuleSourceProvider = {
  /** Location of an absolute dotted module name, or undefined when not found */
  readonly locate: (moduleName: string) => ModuleLocation | undefined;
  /** Location of a file given by path (the analysis target) */
  readonly open: (path: string) => Result<ModuleLocation, string>;
  readonly read: (location: ModuleLocation) => Result<string, string>;
};

/**
 * The file operations a provider needs
 */
export type FileAccess = {
  readonly isFile: (path: string) => boolean;
  readonly readText: (path: string) => Result<string, string>;
};

const INIT_FILE = "__init__.py";

/**
 * Directory containing the outermost package that holds `file`
 */
export const packageRoot = (access: FileAccess, file: string): string => {
  let directory = dirname(file);
  while (access.isFile(join(directory, INIT_FILE))) {
    const parent = dirname(directory);
    if (parent === directory) {
      break;
    }
    directory = parent;
  }
  return directory;
};

const moduleNameOf = (root: string, file: string): string => {
  const parts = relative(root, file).replace(/\.py$/, "").split(sep);
  if (parts[parts.length - 1] === "__init__") {
    parts.pop();
  }
  return parts.join(".");
};

export const createModuleSourceProvider = (
  access: FileAccess,
  searchPaths: readonly string[] = []
): ModuleSourceProvider => {
  const roots: string[] = searchPaths.map((path) => resolve(path));
  const located = new Map<string, ModuleLocation | undefined>();

  const addRoot = (root: string): void => {
    if (!roots.includes(root)) {
      roots.unshift(root);
      located.clear();
    }
  };

  const locateIn = (root: string, moduleName: string): ModuleLocation | undefined => {
    const parts = moduleName.split(".");
    const asFile = `${join(root, ...parts)}.py`;
    if (access.isFile(asFile)) {
      return {
        path: asFile,
        moduleName,
        category: categorize(moduleName, asFile),
        isPackage: false,
      };
    }
    const asPackage = join(root, ...parts, INIT_FILE);
    if (access.isFile(asPackage)) {
      return {
        path: asPackage,
        moduleName,
        category: categorize(moduleName, asPackage),
        isPackage: true,
      };
    }
    return undefined;
  };

  const locate = (moduleName: string): ModuleLocation | undefined => {
    if (located.has(moduleName)) {
      return located.get(moduleName);
    }
    let location: ModuleLocation | undefined;
    for (const root of roots) {
      location = locateIn(root, moduleName);
      if (location) {
        break;
      }
    }
    located.set(moduleName, location);
    return location;
  };

  const open = (path: string): Result<ModuleLocation, string> => {
    const file = resolve(path);
    if (!access.isFile(file)) {
      return error(`File not found: ${file}`);
    }
    const root = packageRoot(access, file);
    addRoot(root);
    addRoot(dirname(file));

    const moduleName = moduleNameOf(root, file);
    return ok({
      path: file,
      moduleName,
      category: categorize(moduleName, file),
      isPackage: basename(file) === INIT_FILE,
    });
  };

  return {
    locate,
    open,
    read: (location) => access.readText(location.path),
  };
};

const diskAccess: FileAccess = {
  isFile: (path) => existsSync(path) && statSync(path).isFile(),
  readText: (path) => {
    try {
      return ok(readFileSync(path, "utf-8"));
    } catch (e) {
      return error(e instanceof Error ? e.message : String(e));
    }
  },
};

/**
 * Provider over the real filesystem. The target's directory and its
 * package root are searched before `searchPaths`.
 */
export const createFileSystemProvider = (
  searchPaths: readonly string[] = []
): ModuleSourceProvider => createModuleSourceProvider(diskAccess, searchPaths);
