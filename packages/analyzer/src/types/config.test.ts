/**
 * Tests for analyzer configuration
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  DEFAULT_MAX_ITERATIONS,
  compilePattern,
  createConfig,
  matchesAny,
} from "./config.js";

describe("Analyzer config", () => {
  describe("createConfig", () => {
    it("should fill defaults", () => {
      const config = createConfig();
      expect(config.ok).to.be.true;
      if (config.ok) {
        expect(config.value.followImports).to.equal(1);
        expect(config.value.strict).to.be.false;
        expect(config.value.threshold).to.equal(0);
        expect(config.value.maxIterations).to.equal(DEFAULT_MAX_ITERATIONS);
        expect(config.value.excludeNames).to.deep.equal([]);
      }
    });

    it("should reject an out-of-range follow level", () => {
      const config = createConfig({ followImports: 4 });
      expect(config.ok).to.be.false;
      if (!config.ok) {
        expect(config.error.code).to.equal("ATR9001");
        expect(config.error.message).to.equal(
          "Follow-imports level must be 0, 1, 2 or 3 (got 4)"
        );
      }
    });

    it("should reject a negative threshold", () => {
      const config = createConfig({ threshold: -1 });
      expect(config.ok).to.be.false;
    });

    it("should reject an invalid pattern", () => {
      const config = createConfig({ excludeNames: ["(unclosed"] });
      expect(config.ok).to.be.false;
      if (!config.ok) {
        expect(config.error.message).to.match(
          /^Invalid exclude pattern '\(unclosed'/
        );
      }
    });
  });

  describe("compilePattern", () => {
    it("should match whole names only", () => {
      const pattern = compilePattern("test_.*");
      expect(pattern.ok).to.be.true;
      if (pattern.ok) {
        expect(matchesAny([pattern.value], "test_one")).to.be.true;
        expect(matchesAny([pattern.value], "my_test_one")).to.be.false;
      }
    });

    it("should treat alternatives as a whole", () => {
      const pattern = compilePattern("a|b");
      expect(pattern.ok && matchesAny([pattern.value], "ab")).to.be.false;
      expect(pattern.ok && matchesAny([pattern.value], "b")).to.be.true;
    });
  });
});
