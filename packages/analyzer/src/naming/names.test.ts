/**
 * Tests for canonical name operations
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  attributePrefixes,
  basenameOf,
  isMethodOnConstant,
  isSynthesized,
  rebaseName,
  withoutCallBrackets,
} from "./names.js";

describe("Canonical names", () => {
  describe("basenameOf", () => {
    it("should strip suffixes and stars", () => {
      expect(basenameOf("a.b[].c()")).to.equal("a");
      expect(basenameOf("*xs")).to.equal("xs");
      expect(basenameOf("**kw.get()")).to.equal("kw");
      expect(basenameOf("@Dict.keys()")).to.equal("@Dict");
      expect(basenameOf("plain")).to.equal("plain");
    });
  });

  describe("rebaseName", () => {
    it("should replace the root and keep suffixes", () => {
      expect(rebaseName("p.attr[]", "x")).to.equal("x.attr[]");
      expect(rebaseName("*p.items", "args")).to.equal("*args.items");
      expect(rebaseName("p", "@Local")).to.equal("@Local");
    });
  });

  describe("isSynthesized", () => {
    it("should detect @-prefixed roots", () => {
      expect(isSynthesized("@BinaryOp.attr")).to.be.true;
      expect(isSynthesized("*@Tuple")).to.be.true;
      expect(isSynthesized("person.name")).to.be.false;
    });
  });

  describe("attributePrefixes", () => {
    it("should list intermediate prefixes of a method call", () => {
      expect(attributePrefixes("a.b.c()")).to.deep.equal(["a.b"]);
      expect(attributePrefixes("a.b.c.d()")).to.deep.equal(["a.b", "a.b.c"]);
      expect(attributePrefixes("a.m()")).to.deep.equal([]);
      expect(attributePrefixes("f()")).to.deep.equal([]);
    });
  });

  it("should drop trailing call brackets once", () => {
    expect(withoutCallBrackets("f()")).to.equal("f");
    expect(withoutCallBrackets("f()()")).to.equal("f()");
    expect(withoutCallBrackets("f")).to.equal("f");
  });

  it("should detect methods on constants", () => {
    expect(isMethodOnConstant("@Constant.join()")).to.be.true;
    expect(isMethodOnConstant("@ConstantX")).to.be.false;
  });
});
