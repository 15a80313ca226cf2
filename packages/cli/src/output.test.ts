/**
 * Tests for stdout renderings
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  createSeverityLedger,
  type AnalysisOutput,
  type CallSite,
  type FunctionIR,
  type FunctionRecord,
  type ModuleIR,
  type Program,
} from "@attrtrace/analyzer";
import {
  collectStats,
  formatStats,
  toIrJson,
  toResultsJson,
} from "./output.js";

const call = (name: string, args: readonly string[] = []): CallSite => ({
  name,
  args,
  kwargs: {},
  target: { kind: "builtin", name },
});

const ir = (parts: {
  gets?: readonly string[];
  sets?: readonly string[];
  calls?: readonly CallSite[];
}): FunctionIR => ({
  gets: new Set(parts.gets ?? []),
  sets: new Set(parts.sets ?? []),
  dels: new Set(),
  calls: parts.calls ?? [],
});

const moduleIR = (
  path: string,
  moduleName: string,
  functions: readonly (readonly [string, FunctionIR])[]
): ModuleIR => ({
  path,
  moduleName,
  category: "local",
  functions: new Map(
    functions.map(([name, body]): [string, FunctionRecord] => [
      name,
      {
        qualifiedName: name,
        kind: "function",
        interface: { posonlyargs: [], args: [], kwonlyargs: [], defaults: {} },
        ir: body,
      },
    ])
  ),
  symbols: new Map(),
  exports: [],
  imports: [],
  ignored: new Set(),
});

describe("Output", () => {
  describe("toResultsJson", () => {
    it("should sort function names and access sets", () => {
      const results = new Map<string, FunctionIR>([
        ["total", ir({ gets: ["order.items", "order.discount"] })],
        ["apply", ir({ sets: ["order.total", "order.paid"] })],
      ]);

      const json = toResultsJson(results);
      expect(Object.keys(json)).to.deep.equal(["apply", "total"]);
      expect(json.total).to.deep.equal({
        calls: [],
        dels: [],
        gets: ["order.discount", "order.items"],
        sets: [],
      });
      expect(json.apply?.sets).to.deep.equal(["order.paid", "order.total"]);
    });

    it("should list callee names once in call order", () => {
      const results = new Map<string, FunctionIR>([
        [
          "report",
          ir({
            calls: [
              call("print()", ["order.total"]),
              call("len()", ["order.items"]),
              call("print()", ["order.paid"]),
            ],
          }),
        ],
      ]);

      expect(toResultsJson(results).report?.calls).to.deep.equal([
        "print()",
        "len()",
      ]);
    });
  });

  describe("toIrJson", () => {
    it("should render every module with call arguments", () => {
      const program: Program = {
        target: "/work/main.py",
        modules: new Map([
          [
            "/work/main.py",
            moduleIR("/work/main.py", "main", [
              ["run", ir({ gets: ["job.id"], calls: [call("print()", ["job.id"])] })],
            ]),
          ],
          ["/work/jobs.py", moduleIR("/work/jobs.py", "jobs", [])],
        ]),
        moduleNames: new Map([
          ["main", "/work/main.py"],
          ["jobs", "/work/jobs.py"],
        ]),
      };

      const json = toIrJson(program);
      expect(Object.keys(json)).to.deep.equal(["/work/jobs.py", "/work/main.py"]);
      expect(json["/work/main.py"]).to.deep.equal({
        moduleName: "main",
        category: "local",
        functions: {
          run: {
            kind: "function",
            gets: ["job.id"],
            sets: [],
            dels: [],
            calls: [{ name: "print()", args: ["job.id"], kwargs: {} }],
          },
        },
      });
    });
  });

  describe("collectStats", () => {
    it("should count modules and functions and read badness from the ledger", () => {
      const ledger = createSeverityLedger();
      const location = { file: "/work/main.py", line: 2, column: 0, length: 1 };
      ledger.record(createDiagnostic("ATR2001", "warning", "w", location));
      ledger.record(
        createDiagnostic("ATR1001", "error", "e", { ...location, file: "/work/jobs.py" })
      );

      const program: Program = {
        target: "/work/main.py",
        modules: new Map([
          [
            "/work/main.py",
            moduleIR("/work/main.py", "main", [
              ["run", ir({})],
              ["stop", ir({})],
            ]),
          ],
          ["/work/jobs.py", moduleIR("/work/jobs.py", "jobs", [["queue", ir({})]])],
        ]),
        moduleNames: new Map(),
      };
      const output: AnalysisOutput = {
        target: "/work/main.py",
        results: new Map(),
        program,
        simplified: program,
        ledger,
      };

      expect(collectStats(output)).to.deep.equal({
        modules: 2,
        functions: 3,
        targetBadness: 1,
        overallBadness: 6,
      });
    });
  });

  describe("formatStats", () => {
    it("should render one aligned line per figure", () => {
      const lines = formatStats(
        { modules: 2, functions: 3, targetBadness: 1, overallBadness: 6 },
        42
      );
      expect(lines).to.deep.equal([
        "Modules loaded:     2",
        "Functions analysed: 3",
        "Target badness:     1",
        "Overall badness:    6",
        "Elapsed:            42ms",
      ]);
    });
  });
});
