/**
 * Tests for operator precedence ordering
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { isGenerisError } from "@generis/core";
import type { PrecedenceEntry } from "./precedence.js";
import { orderByPrecedence } from "./precedence.js";

const entry = (
  entityId: string,
  dependsOn: readonly string[] = []
): PrecedenceEntry<string> => ({ item: entityId, entityId, dependsOn });

describe("orderByPrecedence", () => {
  it("should keep registration order without constraints", () => {
    expect(orderByPrecedence([entry("C"), entry("A"), entry("B")])).to.deep.equal([
      "C",
      "A",
      "B",
    ]);
  });

  it("should move dependencies ahead of their dependents", () => {
    expect(orderByPrecedence([entry("B", ["A"]), entry("A")])).to.deep.equal(["A", "B"]);
  });

  it("should take the earliest registered ready entry at each step", () => {
    const order = orderByPrecedence([
      entry("D", ["B"]),
      entry("C"),
      entry("B"),
      entry("A"),
    ]);
    expect(order).to.deep.equal(["C", "B", "D", "A"]);
  });

  it("should apply module precedence pairs", () => {
    expect(
      orderByPrecedence([entry("X"), entry("Y")], [["X", "Y"]])
    ).to.deep.equal(["Y", "X"]);
  });

  it("should ignore dependencies on unknown entities", () => {
    expect(orderByPrecedence([entry("A", ["Missing"]), entry("B")])).to.deep.equal([
      "A",
      "B",
    ]);
  });

  it("should reject cycles", () => {
    try {
      orderByPrecedence([entry("A", ["B"]), entry("B", ["A"]), entry("C")]);
      expect.fail("expected a cycle error");
    } catch (err) {
      expect(isGenerisError(err, "GEN1002")).to.equal(true);
      if (isGenerisError(err)) {
        expect(err.diagnostic.message).to.equal(
          "Cyclic operator precedence among: A, B"
        );
      }
    }
  });
});
