/**
 * Tests for class and method analysis
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  analyseSource,
  codesOf,
  plain,
  py,
  resultsOf,
} from "../testing/harness.js";

const ACCOUNT = py(
  "class Account:",
  "    def __init__(self, owner):",
  "        self.owner = owner",
  "        self.balance = 0",
  "",
  "    def deposit(self, amount):",
  "        self.balance += amount",
  "",
  "    @staticmethod",
  "    def create(owner):",
  "        return Account(owner)",
  "",
  "def open_account(name):",
  "    account = Account(name)",
  "    account.deposit(10)",
  "    return account"
);

describe("Class visitor", () => {
  it("should key methods by class and the initialiser by the class name", async () => {
    const results = resultsOf(await analyseSource(ACCOUNT));
    expect([...results.keys()].sort()).to.deep.equal([
      "Account",
      "Account.create",
      "Account.deposit",
      "open_account",
    ]);
  });

  it("should analyse the initialiser", async () => {
    const results = resultsOf(await analyseSource(ACCOUNT));
    expect(plain(results.get("Account"))).to.deep.equal({
      gets: ["owner"],
      sets: ["self.balance", "self.owner"],
      dels: [],
      calls: [],
    });
    expect(plain(results.get("Account.deposit"))).to.deep.equal({
      gets: ["amount", "self.balance"],
      sets: ["self.balance"],
      dels: [],
      calls: [],
    });
  });

  it("should bind the initialiser's self to the receiver", async () => {
    const results = resultsOf(await analyseSource(ACCOUNT));
    expect(plain(results.get("open_account"))).to.deep.equal({
      gets: ["account", "name"],
      sets: ["account", "account.balance", "account.owner"],
      dels: [],
      calls: ["Account()", "account.deposit()"],
    });
    expect(plain(results.get("Account.create"))).to.deep.equal({
      gets: ["owner"],
      sets: ["@ReturnValue.balance", "@ReturnValue.owner"],
      dels: [],
      calls: ["Account()"],
    });
  });

  it("should bind a classmethod's first parameter to the class", async () => {
    const results = resultsOf(
      await analyseSource(
        py(
          "class Registry:",
          "    default = None",
          "",
          "    @classmethod",
          "    def build(cls, source):",
          "        cls.default = source.value",
          "        return cls",
          "",
          "def make(src):",
          "    return Registry.build(src)"
        )
      )
    );
    expect(plain(results.get("make"))).to.deep.equal({
      gets: ["Registry", "src", "src.value"],
      sets: ["Registry.default"],
      dels: [],
      calls: ["Registry.build()"],
    });
  });

  it("should warn when an instance is not stored", async () => {
    const analysed = await analyseSource(
      py(
        "class Greeter:",
        "    def __init__(self, name):",
        "        self.name = name",
        "",
        "def greet(n):",
        "    Greeter(n)"
      )
    );
    expect(plain(resultsOf(analysed).get("greet"))).to.deep.equal({
      gets: ["n"],
      sets: ["@Greeter.name"],
      dels: [],
      calls: ["Greeter()"],
    });
    expect(codesOf(analysed.diagnostics)).to.deep.equal(["ATR3002"]);
  });

  it("should hide class attributes from method bodies", async () => {
    const analysed = await analyseSource(
      py(
        "class Config:",
        "    debug = False",
        "",
        "    def show(self):",
        "        return debug"
      )
    );
    expect(codesOf(analysed.diagnostics)).to.deep.equal(["ATR2001"]);
  });

  it("should report nested classes", async () => {
    const analysed = await analyseSource(
      py(
        "class Outer:",
        "    class Inner:",
        "        pass",
        "",
        "    def method(self):",
        "        pass"
      )
    );
    expect(codesOf(analysed.diagnostics)).to.deep.equal(["ATR3004"]);
    expect([...resultsOf(analysed).keys()]).to.deep.equal(["Outer.method"]);
  });
});
