/**
 * Tests for effect substitution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createFunctionIR, emptyInterface, sortedNames } from "../types/ir.js";
import { substituteEffects, substituteName } from "./substitute.js";

describe("Substitution", () => {
  const parameters = new Set(["p", "q"]);

  it("should rebase names rooted at a bound parameter", () => {
    const mapping = new Map([["p", "order.customer"]]);
    expect(substituteName("p.name", mapping, parameters)).to.equal(
      "order.customer.name"
    );
    expect(substituteName("*p", mapping, parameters)).to.equal("*order.customer");
  });

  it("should drop names rooted at an unbound parameter", () => {
    expect(substituteName("q.size", new Map(), parameters)).to.be.undefined;
  });

  it("should pass other names through", () => {
    expect(substituteName("config.debug", new Map(), parameters)).to.equal(
      "config.debug"
    );
  });

  it("should substitute every effect set", () => {
    const ir = createFunctionIR({
      gets: ["p.a", "q.b", "settings"],
      sets: ["p.c"],
      dels: ["q.d"],
    });
    const effects = substituteEffects(
      ir,
      { ...emptyInterface, args: ["p", "q"] },
      new Map([["p", "x"]])
    );
    expect(sortedNames(effects.gets)).to.deep.equal(["settings", "x.a"]);
    expect(sortedNames(effects.sets)).to.deep.equal(["x.c"]);
    expect(sortedNames(effects.dels)).to.deep.equal([]);
  });
});
