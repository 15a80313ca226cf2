/**
 * Tests for the module loader and import following
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { interpreterSearchPaths } from "./interpreter.js";
import {
  analyseFiles,
  codesOf,
  plain,
  py,
  resultsOf,
} from "../testing/harness.js";
import { ok } from "../types/result.js";

const HELPERS = {
  "main.py": py(
    "from helpers import describe",
    "",
    "def show(item):",
    "    return describe(item)"
  ),
  "helpers.py": py("def describe(thing):", "    return thing.name"),
};

describe("Module loader", () => {
  it("should fold effects of functions from local modules", async () => {
    const analysed = await analyseFiles(HELPERS);
    expect(plain(resultsOf(analysed).get("show"))?.gets).to.deep.equal([
      "item",
      "item.name",
    ]);
    expect(codesOf(analysed.diagnostics)).to.deep.equal([]);
  });

  it("should not follow imports at level 0", async () => {
    const analysed = await analyseFiles(HELPERS, { followImports: 0 });
    expect(plain(resultsOf(analysed).get("show"))?.gets).to.deep.equal(["item"]);
    expect(codesOf(analysed.diagnostics)).to.deep.equal(["ATR5003"]);
  });

  it("should not follow excluded imports", async () => {
    const analysed = await analyseFiles(HELPERS, { excludeImports: ["help.*"] });
    expect(analysed.output.ok).to.be.true;
    if (analysed.output.ok) {
      expect(analysed.output.value.program.modules.size).to.equal(1);
    }
  });

  it("should resolve package and relative imports", async () => {
    const analysed = await analyseFiles({
      "main.py": py(
        "from shop.orders import total",
        "",
        "def report(order):",
        "    return total(order)"
      ),
      "shop/__init__.py": "",
      "shop/orders.py": py(
        "from .pricing import price",
        "",
        "def total(order):",
        "    return price(order.lines)"
      ),
      "shop/pricing.py": py("def price(lines):", "    return lines.amount"),
    });
    expect(plain(resultsOf(analysed).get("report"))?.gets).to.deep.equal([
      "order",
      "order.lines",
      "order.lines.amount",
    ]);
  });

  it("should expand star imports through __all__", async () => {
    const analysed = await analyseFiles({
      "main.py": py(
        "from shapes import *",
        "",
        "def measure(box):",
        "    return area(box)"
      ),
      "shapes.py": py(
        '__all__ = ["area"]',
        "",
        "def area(shape):",
        "    return shape.width * shape.height",
        "",
        "def perimeter(shape):",
        "    return shape.width + shape.height"
      ),
    });
    expect(plain(resultsOf(analysed).get("measure"))?.gets).to.deep.equal([
      "box",
      "box.height",
      "box.width",
    ]);
    expect(codesOf(analysed.diagnostics)).to.deep.equal([]);
  });

  it("should warn when a star import cannot be expanded", async () => {
    const analysed = await analyseFiles({
      "main.py": py("from nowhere import *", "", "def f():", "    pass"),
    });
    expect(codesOf(analysed.diagnostics)).to.deep.equal(["ATR1004", "ATR1005"]);
  });

  it("should terminate on circular imports", async () => {
    const analysed = await analyseFiles({
      "main.py": py("import alpha", "", "def run(x):", "    return alpha.first(x)"),
      "alpha.py": py("import beta", "", "def first(p):", "    return beta.second(p)"),
      "beta.py": py("import alpha", "", "def second(q):", "    return q.value"),
    });
    expect(plain(resultsOf(analysed).get("run"))?.gets).to.deep.equal([
      "x",
      "x.value",
    ]);
    expect(analysed.output.ok && analysed.output.value.program.modules.size).to.equal(3);
  });

  it("should assume unlocatable absolute imports are third-party", async () => {
    const analysed = await analyseFiles({
      "main.py": py("import requests", "", "def fetch(url):", "    return requests.get(url)"),
    });
    expect(
      analysed.diagnostics.map((d) => [d.code, d.severity])
    ).to.deep.equal([
      ["ATR1005", "info"],
      ["ATR5003", "info"],
    ]);
  });

  it("should not follow the standard library below level 3", async () => {
    const analysed = await analyseFiles({
      "main.py": py("import os", "", "def cwd():", "    return os.getcwd()"),
    });
    expect(codesOf(analysed.diagnostics)).to.deep.equal(["ATR5003"]);
  });

  it("should report unlocatable relative imports as errors", async () => {
    const analysed = await analyseFiles({
      "main.py": py("from .missing import thing", "", "def f():", "    pass"),
    });
    expect(
      analysed.diagnostics.map((d) => [d.code, d.severity, d.message])
    ).to.deep.equal([
      ["ATR1001", "error", "Unable to locate module 'missing' imported by 'main'"],
    ]);
  });

  it("should report a relative import outside any package", async () => {
    const analysed = await analyseFiles({
      "main.py": py(
        "from . import sibling",
        "",
        "def f(x):",
        "    return sibling.g(x)"
      ),
      "sibling.py": py("def g(y):", "    return y.value"),
    });
    expect(analysed.output.ok).to.be.true;
    expect(
      analysed.diagnostics
        .filter((d) => d.code === "ATR1001")
        .map((d) => [d.severity, d.message])
    ).to.deep.equal([
      ["error", "Unable to resolve relative import '.' in 'main': no parent package"],
    ]);
  });

  describe("interpreter search paths", () => {
    const LIB = "/usr/lib/python3.12";
    const SITE = "/usr/lib/python3.12/site-packages";
    const sysPath = interpreterSearchPaths("python3", () =>
      ok(JSON.stringify(["", LIB, `${LIB}/lib-dynload`, SITE]))
    );
    const searchPaths = sysPath.ok ? sysPath.value : [];

    it("should follow the standard library found on sys.path at level 3", async () => {
      const analysed = await analyseFiles(
        {
          "main.py": py("import os", "", "def cwd():", "    return os.getcwd()"),
          [`${LIB}/os.py`]: py("def getcwd():", "    return '.'"),
        },
        { followImports: 3, searchPaths }
      );
      expect(sysPath.ok).to.be.true;
      expect(codesOf(analysed.diagnostics)).to.deep.equal([]);
      expect(
        analysed.output.ok && analysed.output.value.program.modules.get(`${LIB}/os.py`)?.category
      ).to.equal("stdlib");
    });

    it("should follow installed packages found on sys.path at level 2", async () => {
      const analysed = await analyseFiles(
        {
          "main.py": py("import numpy", "", "def mean(xs):", "    return numpy.mean(xs)"),
          [`${SITE}/numpy/__init__.py`]: py("def mean(values):", "    return values.total"),
        },
        { followImports: 2, searchPaths }
      );
      expect(codesOf(analysed.diagnostics)).to.deep.equal([]);
      expect(
        analysed.output.ok &&
          analysed.output.value.program.modules.get(`${SITE}/numpy/__init__.py`)?.category
      ).to.equal("pip");
    });

    it("should note builtin modules without source at level 3", async () => {
      const analysed = await analyseFiles(
        { "main.py": py("import sys", "", "def f():", "    pass") },
        { followImports: 3, searchPaths }
      );
      expect(
        analysed.diagnostics.map((d) => [d.code, d.severity, d.message])
      ).to.deep.equal([
        ["ATR1001", "info", "Module 'sys' imported by 'main' has no Python source"],
      ]);
    });
  });

  it("should drop an imported module that does not parse", async () => {
    const analysed = await analyseFiles({
      ...HELPERS,
      "helpers.py": py("def describe(:"),
    });
    expect(analysed.output.ok).to.be.true;
    expect(
      analysed.diagnostics.map((d) => [d.code, d.severity])
    ).to.deep.equal([
      ["ATR1002", "error"],
      ["ATR5003", "info"],
    ]);
  });

  it("should keep the target alive when strict mode aborts an import", async () => {
    const analysed = await analyseFiles(
      { ...HELPERS, "helpers.py": py("def describe(:") },
      { strict: true }
    );
    expect(analysed.output.ok).to.be.true;
    expect(analysed.diagnostics[0]?.severity).to.equal("fatal");
  });

  it("should fail when the target does not parse", async () => {
    const analysed = await analyseFiles({ "main.py": py("def broken(:") });
    expect(analysed.output.ok).to.be.false;
    if (!analysed.output.ok) {
      expect(analysed.output.error.diagnostic.code).to.equal("ATR1002");
      expect(analysed.output.error.diagnostic.severity).to.equal("fatal");
    }
  });

  it("should fail when the target is missing", async () => {
    const analysed = await analyseFiles({ "other.py": "" });
    expect(analysed.output.ok).to.be.false;
    if (!analysed.output.ok) {
      expect(analysed.output.error.diagnostic.code).to.equal("ATR1003");
    }
  });
});
