/**
 * Tests for configuration loading and resolution
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { findConfig, loadConfig, resolveConfig } from "./config.js";

describe("Config", () => {
  describe("resolveConfig", () => {
    it("should apply defaults", () => {
      expect(resolveConfig()).to.deep.equal({
        verbose: false,
        maxDepth: 64,
        hints: {},
      });
    });

    it("should let overrides win and merge hints by name", () => {
      const result = resolveConfig(
        { verbose: true, maxDepth: 8, hints: { nullBehavior: "setNulls", scale: 2 } },
        { maxDepth: 16, hints: { scale: 3 } }
      );
      expect(result).to.deep.equal({
        verbose: true,
        maxDepth: 16,
        hints: { nullBehavior: "setNulls", scale: 3 },
      });
    });
  });

  describe("loadConfig", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "generis-config-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should report a missing file", () => {
      const file = path.join(tempDir, "generis.json");
      expect(loadConfig(file)).to.deep.equal({
        ok: false,
        error: `Config file not found: ${file}`,
      });
    });

    it("should reject invalid field types", () => {
      const file = path.join(tempDir, "generis.json");
      fs.writeFileSync(file, JSON.stringify({ maxDepth: 0 }));
      expect(loadConfig(file)).to.deep.equal({
        ok: false,
        error: "generis.json: 'maxDepth' must be a positive integer",
      });

      fs.writeFileSync(file, JSON.stringify(["verbose"]));
      expect(loadConfig(file)).to.deep.equal({
        ok: false,
        error: "generis.json: top level must be an object",
      });
    });

    it("should report malformed JSON", () => {
      const file = path.join(tempDir, "generis.json");
      fs.writeFileSync(file, "{ verbose: ");
      const result = loadConfig(file);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.startsWith("Failed to parse generis.json:")).to.equal(true);
      }
    });

    it("should load a valid file", () => {
      const file = path.join(tempDir, "generis.json");
      fs.writeFileSync(
        file,
        JSON.stringify({ verbose: true, hints: { nullBehavior: "noop" } })
      );
      expect(loadConfig(file)).to.deep.equal({
        ok: true,
        value: { verbose: true, maxDepth: undefined, hints: { nullBehavior: "noop" } },
      });
    });
  });

  describe("findConfig", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "generis-find-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should find generis.json in a parent directory", () => {
      const nested = path.join(tempDir, "a", "b");
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempDir, "generis.json"), "{}");
      expect(findConfig(nested)).to.equal(path.join(path.resolve(tempDir), "generis.json"));
    });
  });
});
