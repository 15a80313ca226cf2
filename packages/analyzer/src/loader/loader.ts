/**
 * Module loader / import follower
 *
 * Loads the target file and, breadth first, every module its imports reach
 * within the follow-imports level. Modules are memoized by canonical path;
 * a module already loaded or queued is never parsed again, so circular
 * imports terminate.
 */

import { createContext } from "../context/context.js";
import type { StarExpander } from "../context/imports.js";
import { moduleExports } from "../context/module-symbols.js";
import { FileAnalysisAborted, type SeverityLedger } from "../ledger/ledger.js";
import { OVERRIDE_PACKAGE } from "../overrides/decide.js";
import {
  findSyntaxError,
  type PythonParser,
  type SyntaxNode,
} from "../syntax/parser.js";
import { locationOf } from "../syntax/nodes.js";
import { matchesAny, type AnalyzerConfig } from "../types/config.js";
import {
  createDiagnostic,
  fileLocation,
  type Diagnostic,
  type DiagnosticSeverity,
} from "../types/diagnostic.js";
import type { ImportReference, ModuleIR, Program } from "../types/ir.js";
import { visitModule } from "../visitor/module-visitor.js";
import { isFollowed, isStdlibModule } from "./categories.js";
import type { ModuleLocation, ModuleSourceProvider } from "./provider.js";

/**
 * A visited module with the diagnostics its visit recorded; they are
 * replayed into each later run's ledger on a cache hit.
 */
export type CachedModule = {
  readonly ir: ModuleIR;
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * Raw Module IR shared across analysis runs, keyed by canonical path.
 * Imported modules are read-only once visited.
 */
export type ModuleCache = Map<string, CachedModule>;

export type LoaderOptions = {
  readonly parser: PythonParser;
  readonly provider: ModuleSourceProvider;
  readonly config: AnalyzerConfig;
  readonly ledger: SeverityLedger;
  readonly cache?: ModuleCache;
};

const rootPackage = (moduleName: string): string =>
  moduleName.split(".")[0] ?? moduleName;

/** Relative imports that climb above the top-level package keep their dots */
const isUnresolvedRelative = (moduleName: string): boolean =>
  moduleName.startsWith(".");

/**
 * Parse `location` and hand its root node to `use`; the tree is released
 * afterwards. Returns undefined after reporting when the module cannot be
 * read or parsed.
 */
const withModuleTree = <T>(
  location: ModuleLocation,
  options: LoaderOptions,
  severity: DiagnosticSeverity,
  use: (root: SyntaxNode) => T
): T | undefined => {
  const { provider, parser, ledger } = options;
  const source = provider.read(location);
  if (!source.ok) {
    ledger.record(
      createDiagnostic(
        "ATR1003",
        severity,
        `Unable to read ${location.path}: ${source.error}`,
        fileLocation(location.path)
      )
    );
    return undefined;
  }

  const tree = parser.parse(source.value);
  try {
    const syntaxError = findSyntaxError(tree.rootNode);
    if (syntaxError) {
      ledger.record(
        createDiagnostic(
          "ATR1002",
          severity,
          `Unable to parse module '${location.moduleName}'`,
          locationOf(syntaxError, location.path)
        )
      );
      return undefined;
    }
    return use(tree.rootNode);
  } finally {
    tree.delete();
  }
};

/**
 * Star-import expansion from a registration-only pass over the named module
 */
const createStarExpander = (options: LoaderOptions): StarExpander => {
  const expanded = new Map<string, readonly string[]>();
  const inProgress = new Set<string>();

  const expand: StarExpander = (moduleName, location) => {
    const known = expanded.get(moduleName);
    if (known) {
      return known;
    }
    if (inProgress.has(moduleName)) {
      return [];
    }

    const unexpanded = (reason: string): readonly string[] => {
      options.ledger.record(
        createDiagnostic(
          "ATR1004",
          "warning",
          `'from ${moduleName} import *' not expanded: ${reason}`,
          location
        )
      );
      return [];
    };

    const target = options.provider.locate(moduleName);
    if (!target) {
      return unexpanded("module not found");
    }

    inProgress.add(moduleName);
    try {
      const source = options.provider.read(target);
      if (!source.ok) {
        return unexpanded(source.error);
      }
      const tree = options.parser.parse(source.value);
      try {
        if (findSyntaxError(tree.rootNode)) {
          return unexpanded("module does not parse");
        }
        // Diagnostics belong to the module's own load, not to this preview
        const report = (): void => undefined;
        const names = moduleExports(tree.rootNode, {
          ctx: createContext(target.path, report),
          module: target,
          report,
          expandStar: expand,
        });
        expanded.set(moduleName, names);
        return names;
      } finally {
        tree.delete();
      }
    } finally {
      inProgress.delete(moduleName);
    }
  };

  return expand;
};

export const loadProgram = (
  targetPath: string,
  options: LoaderOptions
): Program => {
  const { provider, config, ledger } = options;
  const level = config.followImports;
  const expandStar = createStarExpander(options);

  const modules = new Map<string, ModuleIR>();
  const moduleNames = new Map<string, string>();
  const queued = new Set<string>();
  const queue: ModuleLocation[] = [];

  const report = (diagnostic: Diagnostic): void => ledger.record(diagnostic);

  const visit = (location: ModuleLocation, isTarget: boolean): ModuleIR | undefined => {
    const cached = isTarget ? undefined : options.cache?.get(location.path);
    if (cached) {
      cached.diagnostics.forEach(report);
      return cached.ir;
    }
    const start = ledger.records().length;
    const ir = withModuleTree(
      location,
      options,
      isTarget ? "fatal" : "error",
      (root) =>
        visitModule(root, {
          module: location,
          category: location.category,
          config,
          report,
          expandStar,
        })
    );
    if (ir && !isTarget) {
      options.cache?.set(location.path, {
        ir,
        diagnostics: ledger.records().slice(start),
      });
    }
    return ir;
  };

  const unlocated = (from: ModuleIR, reference: ImportReference): Diagnostic => {
    const name = reference.moduleName;
    if (isUnresolvedRelative(name)) {
      return createDiagnostic(
        "ATR1001",
        "error",
        `Unable to resolve relative import '${name}' in '${from.moduleName}': no parent package`,
        reference.location
      );
    }
    if (!reference.relative && level === 1) {
      return createDiagnostic(
        "ATR1005",
        "info",
        `'${name}' not found locally, assumed to be third-party`,
        reference.location
      );
    }
    // Builtin and compiled extension modules have no source to follow
    if (!reference.relative && (isStdlibModule(name) || from.category !== "local")) {
      return createDiagnostic(
        "ATR1001",
        "info",
        `Module '${name}' imported by '${from.moduleName}' has no Python source`,
        reference.location
      );
    }
    return createDiagnostic(
      "ATR1001",
      "error",
      `Unable to locate module '${name}' imported by '${from.moduleName}'`,
      reference.location
    );
  };

  const follow = (from: ModuleIR, reference: ImportReference): void => {
    const name = reference.moduleName;
    if (
      rootPackage(name) === OVERRIDE_PACKAGE ||
      level === 0 ||
      matchesAny(config.excludeImports, name) ||
      (level < 3 && isStdlibModule(name))
    ) {
      return;
    }

    const location = isUnresolvedRelative(name) ? undefined : provider.locate(name);
    if (!location) {
      if (reference.optional) {
        return;
      }
      report(unlocated(from, reference));
      return;
    }

    if (!isFollowed(location.category, level) || queued.has(location.path)) {
      return;
    }
    queued.add(location.path);
    queue.push(location);
  };

  const followImports = (ir: ModuleIR): void => {
    const seen = new Set<string>();
    for (const reference of ir.imports) {
      if (!seen.has(reference.moduleName)) {
        seen.add(reference.moduleName);
        follow(ir, reference);
      }
    }
  };

  const target = provider.open(targetPath);
  if (!target.ok) {
    report(
      createDiagnostic("ATR1003", "fatal", target.error, fileLocation(targetPath))
    );
    throw new Error("ICE: fatal diagnostic did not abort the analysis");
  }

  // Fatal diagnostics for the target propagate to the caller
  const targetIR = visit(target.value, true);
  if (!targetIR) {
    throw new Error("ICE: target module produced no IR without a fatal diagnostic");
  }
  queued.add(targetIR.path);
  modules.set(targetIR.path, targetIR);
  moduleNames.set(targetIR.moduleName, targetIR.path);
  followImports(targetIR);

  for (let location = queue.shift(); location; location = queue.shift()) {
    try {
      const ir = visit(location, false);
      if (!ir) {
        continue;
      }
      modules.set(ir.path, ir);
      moduleNames.set(ir.moduleName, ir.path);
      followImports(ir);
    } catch (e) {
      if (!(e instanceof FileAnalysisAborted) || e.file !== location.path) {
        throw e;
      }
      // A fatal imported module is dropped and its names stay foreign
      modules.delete(location.path);
      moduleNames.delete(location.moduleName);
    }
  }

  return { target: targetIR.path, modules, moduleNames };
};
