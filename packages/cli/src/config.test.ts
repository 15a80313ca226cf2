/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  CONFIG_FILE_NAME,
  findConfig,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./config.js";
import type { AttrtraceConfig, CliOptions } from "./types.js";

const tempDir = (): string =>
  fs.mkdtempSync(path.join(os.tmpdir(), "attrtrace-test-"));

describe("Config", () => {
  describe("validateConfig", () => {
    it("should accept a complete configuration", () => {
      const raw = {
        followImports: 2,
        excludeImports: ["vendor"],
        exclude: ["_private"],
        warningLevel: "local",
        strict: true,
        stdout: "stats",
        searchPaths: ["lib"],
        collapseHome: true,
        truncateDeepPaths: false,
        cacheFile: ".attrtrace-cache.json",
      };
      const result = validateConfig(raw);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.followImports).to.equal(2);
        expect(result.value.warningLevel).to.equal("local");
        expect(result.value.searchPaths).to.deep.equal(["lib"]);
        expect(result.value.threshold).to.be.undefined;
      }
    });

    it("should reject a field of the wrong type", () => {
      const result = validateConfig({ exclude: "_private" });
      expect(result).to.deep.equal({
        ok: false,
        error: "attrtrace.json: 'exclude' must be an array of strings",
      });
    });

    it("should reject an out-of-range follow-imports level", () => {
      const result = validateConfig({ followImports: 7 });
      expect(result).to.deep.equal({
        ok: false,
        error: "attrtrace.json: 'followImports' must be 0, 1, 2 or 3",
      });
    });

    it("should reject unknown keys", () => {
      const result = validateConfig({ followImport: 1 });
      expect(result).to.deep.equal({
        ok: false,
        error: "attrtrace.json: unknown key 'followImport'",
      });
    });

    it("should reject strict together with a threshold", () => {
      const result = validateConfig({ strict: true, threshold: 3 });
      expect(result.ok).to.equal(false);
    });

    it("should reject an empty interpreter name", () => {
      const result = validateConfig({ python: "" });
      expect(result).to.deep.equal({
        ok: false,
        error: "attrtrace.json: 'python' must be a non-empty string",
      });
    });

    it("should reject a top-level array", () => {
      const result = validateConfig([]);
      expect(result).to.deep.equal({
        ok: false,
        error: "attrtrace.json: expected an object",
      });
    });
  });

  describe("loadConfig", () => {
    it("should load a configuration file", () => {
      const dir = tempDir();
      const configPath = path.join(dir, CONFIG_FILE_NAME);
      fs.writeFileSync(configPath, JSON.stringify({ threshold: 4 }));

      const result = loadConfig(configPath);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.threshold).to.equal(4);
      }
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should report malformed JSON", () => {
      const dir = tempDir();
      const configPath = path.join(dir, CONFIG_FILE_NAME);
      fs.writeFileSync(configPath, "{ threshold: ");

      const result = loadConfig(configPath);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.match(/^Failed to parse attrtrace\.json: /);
      }
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should report a missing file", () => {
      const result = loadConfig("/nonexistent/attrtrace.json");
      expect(result).to.deep.equal({
        ok: false,
        error: "Config file not found: /nonexistent/attrtrace.json",
      });
    });
  });

  describe("findConfig", () => {
    it("should walk up to the nearest attrtrace.json", () => {
      const dir = tempDir();
      const nested = path.join(dir, "src", "app");
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), "{}");

      expect(findConfig(nested)).to.equal(path.join(dir, CONFIG_FILE_NAME));
      fs.rmSync(dir, { recursive: true, force: true });
    });
  });

  describe("resolveConfig", () => {
    it("should apply defaults", () => {
      const result = resolveConfig({}, {}, "/project", "/work", "main.py");
      expect(result).to.deep.equal({
        target: "/work/main.py",
        projectRoot: "/project",
        followImports: 1,
        excludeImports: [],
        exclude: [],
        warningLevel: "default",
        strict: false,
        threshold: 0,
        stdout: "results",
        searchPaths: [],
        python: "python3",
        collapseHome: false,
        truncateDeepPaths: false,
        cacheFile: undefined,
        forceRefreshCache: false,
        verbose: false,
      });
    });

    it("should override config with CLI options", () => {
      const config: AttrtraceConfig = {
        followImports: 0,
        warningLevel: "none",
        stdout: "stats",
        collapseHome: true,
      };
      const cliOptions: CliOptions = {
        followImports: 3,
        warningLevel: "all",
        stdout: "silent",
      };

      const result = resolveConfig(config, cliOptions, "/project", "/work", "main.py");
      expect(result.followImports).to.equal(3);
      expect(result.warningLevel).to.equal("all");
      expect(result.stdout).to.equal("silent");
      expect(result.collapseHome).to.equal(true);
    });

    it("should append CLI patterns to configured ones", () => {
      const result = resolveConfig(
        { excludeImports: ["vendor"], exclude: ["_.*"] },
        { excludeImports: ["legacy"], exclude: ["test_.*"] },
        "/project",
        "/work",
        "main.py"
      );
      expect(result.excludeImports).to.deep.equal(["vendor", "legacy"]);
      expect(result.exclude).to.deep.equal(["_.*", "test_.*"]);
    });

    it("should resolve file paths against the config directory and CLI paths against cwd", () => {
      const result = resolveConfig(
        { searchPaths: ["lib"], cacheFile: ".cache.json" },
        { searchPaths: ["extra"] },
        "/project",
        "/work",
        "/abs/main.py"
      );
      expect(result.target).to.equal("/abs/main.py");
      expect(result.searchPaths).to.deep.equal(["/work/extra", "/project/lib"]);
      expect(result.cacheFile).to.equal("/project/.cache.json");
    });

    it("should let --python override the configured interpreter", () => {
      const configured = resolveConfig(
        { python: "python3.11" },
        {},
        "/project",
        "/work",
        "main.py"
      );
      const overridden = resolveConfig(
        { python: "python3.11" },
        { python: "/opt/venv/bin/python" },
        "/project",
        "/work",
        "main.py"
      );
      expect(configured.python).to.equal("python3.11");
      expect(overridden.python).to.equal("/opt/venv/bin/python");
    });

    it("should let --threshold displace a configured strict mode", () => {
      const result = resolveConfig(
        { strict: true },
        { threshold: 5 },
        "/project",
        "/work",
        "main.py"
      );
      expect(result.strict).to.equal(false);
      expect(result.threshold).to.equal(5);
    });

    it("should let --strict displace a configured threshold", () => {
      const result = resolveConfig(
        { threshold: 5 },
        { strict: true },
        "/project",
        "/work",
        "main.py"
      );
      expect(result.strict).to.equal(true);
      expect(result.threshold).to.equal(0);
    });
  });
});
