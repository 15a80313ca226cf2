/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  fileLocation,
  formatDiagnostic,
  isDiagnosticCode,
  isErrorOrWorse,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create a diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "ATR4001",
        "error",
        "'x + 1' is not a literal",
        { file: "app.py", line: 3, column: 2, length: 5 },
        "use a string"
      );

      expect(diagnostic.code).to.equal("ATR4001");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.location?.line).to.equal(3);
      expect(diagnostic.hint).to.equal("use a string");
    });

    it("should create a diagnostic without optional fields", () => {
      const diagnostic = createDiagnostic("ATR9001", "error", "bad level");
      expect(diagnostic.location).to.be.undefined;
      expect(diagnostic.hint).to.be.undefined;
    });
  });

  describe("formatDiagnostic", () => {
    it("should format diagnostic with location", () => {
      const diagnostic = createDiagnostic(
        "ATR2001",
        "warning",
        "'x' potentially undefined",
        { file: "/src/app.py", line: 5, column: 10, length: 1 }
      );
      expect(formatDiagnostic(diagnostic)).to.equal(
        "/src/app.py:5:10 warning ATR2001: 'x' potentially undefined"
      );
    });

    it("should omit line and column for a whole-file location", () => {
      const diagnostic = createDiagnostic(
        "ATR1002",
        "fatal",
        "Unable to parse module 'app'",
        fileLocation("/src/app.py")
      );
      expect(formatDiagnostic(diagnostic)).to.equal(
        "/src/app.py fatal ATR1002: Unable to parse module 'app'"
      );
    });

    it("should apply the path formatter and append the hint", () => {
      const diagnostic = createDiagnostic(
        "ATR3005",
        "fatal",
        "nested function 'f' writes global 'x'",
        { file: "/home/dev/app.py", line: 1, column: 1, length: 3 },
        "move the write"
      );
      const formatted = formatDiagnostic(diagnostic, (path) =>
        path.replace("/home/dev", "~")
      );
      expect(formatted).to.equal(
        "~/app.py:1:1 fatal ATR3005: nested function 'f' writes global 'x' Hint: move the write"
      );
    });

    it("should format a diagnostic without location", () => {
      const diagnostic = createDiagnostic("ATR9001", "error", "bad level");
      expect(formatDiagnostic(diagnostic)).to.equal("error ATR9001: bad level");
    });
  });

  describe("isErrorOrWorse", () => {
    it("should accept errors and fatals only", () => {
      expect(isErrorOrWorse(createDiagnostic("ATR5001", "error", "m"))).to.be.true;
      expect(isErrorOrWorse(createDiagnostic("ATR3005", "fatal", "m"))).to.be.true;
      expect(isErrorOrWorse(createDiagnostic("ATR2001", "warning", "m"))).to.be.false;
      expect(isErrorOrWorse(createDiagnostic("ATR3003", "info", "m"))).to.be.false;
    });
  });

  describe("isDiagnosticCode", () => {
    it("should accept known codes only", () => {
      expect(isDiagnosticCode("ATR5002")).to.be.true;
      expect(isDiagnosticCode("ATR5999")).to.be.false;
      expect(isDiagnosticCode("atr5002")).to.be.false;
    });
  });
});
