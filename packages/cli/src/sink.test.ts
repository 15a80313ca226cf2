/**
 * Tests for the console diagnostics sink
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createDiagnostic, type Diagnostic } from "@attrtrace/analyzer";
import { createConsoleSink, shouldReport } from "./sink.js";
import type { WarningLevel } from "./types.js";

const TARGET = "/work/main.py";

const at = (file: string) => ({ file, line: 3, column: 5, length: 4 });

const localWarning = createDiagnostic(
  "ATR2001",
  "warning",
  "Name 'x' is potentially undefined",
  at(TARGET)
);
const importedWarning = createDiagnostic(
  "ATR3007",
  "warning",
  "Method call target unknown",
  at("/work/helpers.py")
);
const info = createDiagnostic("ATR3003", "info", "Closure folded", at(TARGET));
const failure = createDiagnostic(
  "ATR1001",
  "error",
  "Unable to locate module",
  at(TARGET)
);

const reported = (level: WarningLevel): readonly Diagnostic[] =>
  [localWarning, importedWarning, info, failure].filter((diagnostic) =>
    shouldReport(diagnostic, level, TARGET)
  );

describe("Diagnostics sink", () => {
  describe("shouldReport", () => {
    it("should report only errors at level none", () => {
      expect(reported("none")).to.deep.equal([failure]);
    });

    it("should add warnings in the target file at level local", () => {
      expect(reported("local")).to.deep.equal([localWarning, failure]);
    });

    it("should add every warning at level default", () => {
      expect(reported("default")).to.deep.equal([
        localWarning,
        importedWarning,
        failure,
      ]);
    });

    it("should add info records at level all", () => {
      expect(reported("all")).to.deep.equal([
        localWarning,
        importedWarning,
        info,
        failure,
      ]);
    });
  });

  describe("createConsoleSink", () => {
    it("should write formatted diagnostics through the path formatter", () => {
      const lines: string[] = [];
      const sink = createConsoleSink({
        warningLevel: "default",
        target: TARGET,
        formatPath: (path) => path.replace("/work/", ""),
        write: (line) => lines.push(line),
      });

      sink(localWarning);
      sink(info);

      expect(lines).to.deep.equal([
        "main.py:3:5 warning ATR2001: Name 'x' is potentially undefined",
      ]);
    });
  });
});
