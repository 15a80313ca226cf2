/**
 * Tests for the severity ledger
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import {
  FileAnalysisAborted,
  RUN_SCOPE,
  createSeverityLedger,
  severityWeight,
} from "./ledger.js";

const at = (file: string) => ({ file, line: 1, column: 1, length: 1 });

describe("Severity ledger", () => {
  it("should weigh severities", () => {
    expect(severityWeight("info")).to.equal(0);
    expect(severityWeight("warning")).to.equal(1);
    expect(severityWeight("error")).to.equal(5);
    expect(severityWeight("fatal")).to.equal(Number.POSITIVE_INFINITY);
  });

  it("should total per file and overall", () => {
    const ledger = createSeverityLedger();
    ledger.record(createDiagnostic("ATR2001", "warning", "w", at("a.py")));
    ledger.record(createDiagnostic("ATR5001", "error", "e", at("a.py")));
    ledger.record(createDiagnostic("ATR3003", "info", "i", at("b.py")));
    ledger.record(createDiagnostic("ATR9001", "error", "run"));

    expect(ledger.total("a.py")).to.equal(6);
    expect(ledger.total("b.py")).to.equal(0);
    expect(ledger.total(RUN_SCOPE)).to.equal(5);
    expect(ledger.total("missing.py")).to.equal(0);
    expect(ledger.overall()).to.equal(11);
    expect(ledger.records()).to.have.length(4);
  });

  it("should compare against a threshold strictly", () => {
    const ledger = createSeverityLedger();
    ledger.record(createDiagnostic("ATR2001", "warning", "w", at("a.py")));
    ledger.record(createDiagnostic("ATR2001", "warning", "w", at("b.py")));

    expect(ledger.exceeds(2)).to.be.false;
    expect(ledger.exceeds(1)).to.be.true;
    expect(ledger.exceeds(1, "a.py")).to.be.false;
    expect(ledger.exceeds(0, "a.py")).to.be.true;
  });

  it("should forward every record to the sink", () => {
    const seen: Diagnostic[] = [];
    const ledger = createSeverityLedger({ sink: (d) => seen.push(d) });
    ledger.record(createDiagnostic("ATR3003", "info", "i", at("a.py")));
    expect(seen.map((d) => d.code)).to.deep.equal(["ATR3003"]);
  });

  it("should abort the file on a fatal record after recording it", () => {
    const ledger = createSeverityLedger();
    const fatal = createDiagnostic("ATR3005", "fatal", "global", at("a.py"));

    expect(() => ledger.record(fatal)).to.throw(FileAnalysisAborted);
    expect(ledger.records()).to.deep.equal([fatal]);
    expect(ledger.total("a.py")).to.equal(Number.POSITIVE_INFINITY);
  });

  it("should carry the file and diagnostic on the abort", () => {
    const ledger = createSeverityLedger();
    try {
      ledger.record(createDiagnostic("ATR1002", "fatal", "parse", at("c.py")));
      expect.fail("expected an abort");
    } catch (e) {
      expect(e).to.be.instanceOf(FileAnalysisAborted);
      if (e instanceof FileAnalysisAborted) {
        expect(e.file).to.equal("c.py");
        expect(e.diagnostic.code).to.equal("ATR1002");
      }
    }
  });

  it("should escalate errors to fatal in strict mode", () => {
    const seen: Diagnostic[] = [];
    const ledger = createSeverityLedger({
      strict: true,
      sink: (d) => seen.push(d),
    });
    ledger.record(createDiagnostic("ATR2001", "warning", "w", at("a.py")));
    expect(() =>
      ledger.record(createDiagnostic("ATR4001", "error", "e", at("a.py")))
    ).to.throw(FileAnalysisAborted);
    expect(seen.map((d) => d.severity)).to.deep.equal(["warning", "fatal"]);
  });
});
