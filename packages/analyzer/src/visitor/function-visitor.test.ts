/**
 * Tests for function body visitation
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  analyseSource,
  codesOf,
  py,
  resultFor,
  resultsOf,
} from "../testing/harness.js";

describe("Function visitor", () => {
  it("should record attribute reads", async () => {
    const result = await resultFor(
      py("def f(person):", "    return person.sales / person.salary"),
      "f"
    );
    expect(result).to.deep.equal({
      gets: ["person.salary", "person.sales"],
      sets: [],
      dels: [],
      calls: [],
    });
  });

  it("should merge accesses after a reassignment", async () => {
    const result = await resultFor(
      py(
        "class C:",
        "    pass",
        "",
        "def f(m):",
        "    print(m.a)",
        "    m = C()",
        "    print(m.b)"
      ),
      "f"
    );
    expect(result).to.deep.equal({
      gets: ["m.a", "m.b"],
      sets: ["m"],
      dels: [],
      calls: ["print()", "C()", "print()"],
    });
  });

  it("should synthesize names for computed values", async () => {
    const result = await resultFor(
      py("def f(a, b):", "    return (a + b).attr"),
      "f"
    );
    expect(result?.gets).to.deep.equal(["@BinaryOp.attr", "a", "b"]);
  });

  it("should read and write augmented targets", async () => {
    const result = await resultFor(
      py("def f(acc, item):", "    acc.total += item.price"),
      "f"
    );
    expect(result?.gets).to.deep.equal(["acc.total", "item.price"]);
    expect(result?.sets).to.deep.equal(["acc.total"]);
  });

  it("should record deletes and read subscript indices", async () => {
    const result = await resultFor(
      py("def f(cache, key):", "    del cache.entries[key]"),
      "f"
    );
    expect(result?.dels).to.deep.equal(["cache.entries[]"]);
    expect(result?.gets).to.deep.equal(["key"]);
  });

  it("should read through subscripts", async () => {
    const result = await resultFor(
      py("def f(items, i):", "    return items[i].name"),
      "f"
    );
    expect(result?.gets).to.deep.equal(["i", "items[].name"]);
  });

  it("should set every name of an unpacking target", async () => {
    const result = await resultFor(
      py("def f(pair):", '    left, right = pair.split(":")'),
      "f"
    );
    expect(result).to.deep.equal({
      gets: [],
      sets: ["left", "right"],
      dels: [],
      calls: ["pair.split()"],
    });
  });

  it("should read the intermediate prefixes of a method call", async () => {
    const result = await resultFor(py("def f(a):", "    a.b.c()"), "f");
    expect(result?.gets).to.deep.equal(["a.b"]);
    expect(result?.calls).to.deep.equal(["a.b.c()"]);
  });

  it("should bind loop targets", async () => {
    const result = await resultFor(
      py("def f(orders):", "    for order in orders:", "        print(order.id)"),
      "f"
    );
    expect(result).to.deep.equal({
      gets: ["order.id", "orders"],
      sets: ["order"],
      dels: [],
      calls: ["print()"],
    });
  });

  it("should bind with-statement aliases", async () => {
    const result = await resultFor(
      py(
        "def f(path):",
        "    with open(path) as handle:",
        "        return handle.read()"
      ),
      "f"
    );
    expect(result).to.deep.equal({
      gets: ["path"],
      sets: ["handle"],
      dels: [],
      calls: ["open()", "handle.read()"],
    });
  });

  it("should bind assignment expressions", async () => {
    const result = await resultFor(
      py(
        "def f(data):",
        "    if (n := len(data)) > 3:",
        "        return n"
      ),
      "f"
    );
    expect(result).to.deep.equal({
      gets: ["data", "n"],
      sets: ["n"],
      dels: [],
      calls: ["len()"],
    });
  });

  it("should resolve a name a for loop assigns after reading it", async () => {
    const analysed = await analyseSource(
      py(
        "def f(items):",
        "    for item in items:",
        "        if seen:",
        "            item.repeat = seen.value",
        "        seen = item"
      )
    );
    expect(codesOf(analysed.diagnostics)).to.deep.equal([]);
    const f = resultsOf(analysed).get("f");
    expect(f && [...f.gets]).to.include.members(["seen", "seen.value"]);
    expect(f && [...f.sets]).to.include.members(["item.repeat", "seen"]);
  });

  it("should resolve a name a while loop assigns after reading it", async () => {
    const analysed = await analyseSource(
      py(
        "def f(queue):",
        "    while queue.pending:",
        "        if batch:",
        "            queue.last = batch",
        "        batch = queue.head"
      )
    );
    expect(codesOf(analysed.diagnostics)).to.deep.equal([]);
  });

  it("should still warn on a name read before the loop that assigns it", async () => {
    const analysed = await analyseSource(
      py(
        "def f(items):",
        "    total = count.value",
        "    for item in items:",
        "        count = item"
      )
    );
    expect(codesOf(analysed.diagnostics)).to.deep.equal(["ATR2001"]);
  });

  it("should warn on names it cannot resolve", async () => {
    const analysed = await analyseSource(py("def f():", "    return missing.value"));
    expect(codesOf(analysed.diagnostics)).to.deep.equal(["ATR2001"]);
  });

  it("should warn on calls to local values", async () => {
    const analysed = await analyseSource(py("def f(callback):", "    callback()"));
    expect(codesOf(analysed.diagnostics)).to.deep.equal(["ATR3006"]);
  });

  it("should report a call result receiver", async () => {
    const analysed = await analyseSource(
      py("def make():", "    pass", "", "def f():", "    item = make()")
    );
    expect(analysed.output.ok).to.be.true;
    if (analysed.output.ok) {
      const call = analysed.output.value.results.get("f")?.calls[0];
      expect(call?.receiver).to.equal("item");
      expect(call?.target).to.deep.equal({
        kind: "function",
        module: "main",
        qualifiedName: "make",
      });
    }
  });
});
