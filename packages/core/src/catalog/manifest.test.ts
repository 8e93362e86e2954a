import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { loadEntityManifest, parseEntityManifest } from "./manifest.js";

describe("Entity Manifest", () => {
  describe("parseEntityManifest", () => {
    it("should reject a non-object document", () => {
      const result = parseEntityManifest(42);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("GEN9004");
      }
    });

    it("should require an entities array", () => {
      const result = parseEntityManifest({ entity: [] });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("GEN9005");
      }
    });

    it("should reject unknown runtime constructors", () => {
      const result = parseEntityManifest({
        entities: [{ id: "Instant", runtime: "Date" }],
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("GEN9006");
        expect(result.error.message).to.equal(
          "entities[0] (Instant): unknown runtime constructor 'Date'"
        );
      }
    });

    it("should reject malformed type parameters", () => {
      const result = parseEntityManifest({
        entities: [{ id: "Box", typeParameters: [{ bounds: ["Object"] }] }],
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal(
          "entities[0] (Box): type parameter must be a string or { name }"
        );
      }
    });

    it("should convert valid entries", () => {
      const result = parseEntityManifest({
        entities: [
          {
            id: "Stack",
            typeParameters: [{ name: "E", bounds: ["Object"] }],
            extends: "AbstractList<E>",
            runtime: "Array",
          },
        ],
      });
      expect(result).to.deep.equal({
        ok: true,
        value: [
          {
            id: "Stack",
            kind: "class",
            typeParameters: [{ name: "E", bounds: ["Object"] }],
            extends: "AbstractList<E>",
            implements: undefined,
            runtime: Array,
          },
        ],
      });
    });
  });

  describe("loadEntityManifest", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "generis-manifest-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should report a missing file", () => {
      const result = loadEntityManifest(path.join(tempDir, "missing.json"));
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("GEN9001");
      }
    });

    it("should report invalid JSON", () => {
      const file = path.join(tempDir, "entities.json");
      fs.writeFileSync(file, "{ entities: ");
      const result = loadEntityManifest(file);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("GEN9003");
      }
    });

    it("should load declarations from disk", () => {
      const file = path.join(tempDir, "entities.json");
      fs.writeFileSync(
        file,
        JSON.stringify({ entities: [{ id: "Marker", kind: "interface" }] })
      );
      const result = loadEntityManifest(file);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.map((d) => [d.id, d.kind])).to.deep.equal([
          ["Marker", "interface"],
        ]);
      }
    });
  });
});
