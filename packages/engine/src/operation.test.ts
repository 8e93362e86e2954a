/**
 * Tests for operations and positions
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createEntityCatalog, isGenerisError, named, wildcardExtends } from "@generis/core";
import { Convert } from "./operations/convert.js";
import { Copy } from "./operations/copy.js";
import { GetElementType } from "./operations/get-element-type.js";
import { Size } from "./operations/size.js";
import { positionsEqual } from "./position.js";
import { box, readOnly, readOnlyValue, readWrite, writable } from "./positions.js";

const codeOf = (fn: () => unknown): string | undefined => {
  try {
    fn();
  } catch (err) {
    return isGenerisError(err) ? err.code : "not a GenerisError";
  }
  return undefined;
};

const listOfString = named("List", named("String"));

describe("Positions", () => {
  it("should validate initial values against the position type", () => {
    const catalog = createEntityCatalog();
    expect(readOnly(named("String"), "a", catalog).getValue()).to.equal("a");
    expect(codeOf(() => readOnly(named("String"), 42, catalog))).to.equal("GEN3004");
    expect(codeOf(() => readOnly(named("String"), null, catalog))).to.equal("GEN3004");
    expect(readOnly(listOfString, null, catalog).getValue()).to.equal(null);
  });

  it("should type a value by its entity", () => {
    const catalog = createEntityCatalog();
    expect(readOnlyValue(catalog, ["a"]).getType()).to.deep.equal(named("ArrayList"));
    expect(readOnlyValue(catalog, new Map()).getType()).to.deep.equal(named("HashMap"));
    expect(codeOf(() => readOnlyValue(catalog, undefined))).to.equal("GEN3004");
  });

  it("should read back written values", () => {
    const position = readWrite<number>(named("Number"));
    expect(position.getValue()).to.equal(undefined);
    position.setValue(3);
    expect(position.getValue()).to.equal(3);
    expect(String(position)).to.equal("Read-Write Position<Number>(3)");
  });

  it("should describe boxes by type only", () => {
    expect(String(box(listOfString))).to.equal("Box<List<String>>");
    expect(box(listOfString).getValue()).to.equal(undefined);
  });

  describe("positionsEqual", () => {
    it("should compare kind, type and value", () => {
      const values = ["a"];
      expect(positionsEqual(readOnly(listOfString, values), readOnly(listOfString, values))).to.equal(true);
      expect(positionsEqual(readOnly(listOfString, values), readOnly(listOfString, ["a"]))).to.equal(false);
      expect(
        positionsEqual(readOnly(listOfString, values), readOnly(named("List"), values))
      ).to.equal(false);
      expect(positionsEqual(readOnly(listOfString, values), readWrite(listOfString, values))).to.equal(false);
      expect(positionsEqual(box(listOfString), box(listOfString))).to.equal(true);
    });
  });
});

describe("Operation", () => {
  it("should start in the created state without a result", () => {
    const size = Size.of(readOnly(listOfString, ["a"]));
    expect(size.state).to.equal("created");
    expect(size.isSuccessful()).to.equal(false);
    expect(codeOf(() => size.getResult())).to.equal("GEN3002");
  });

  it("should follow the lifecycle", () => {
    const size = Size.of(readOnly(listOfString, ["a"]));
    size.transitionTo("matching");
    size.transitionTo("executing");
    size.setResult(1);
    size.transitionTo("succeeded");
    expect(size.isTerminal()).to.equal(true);
    expect(size.getResult()).to.equal(1);
    expect(codeOf(() => size.transitionTo("matching"))).to.equal("GEN3003");
  });

  it("should only reset safe operations", () => {
    const source = readOnly(named("String"), "a");
    const target = readOnly(named("String"), "b");

    const once = Copy.to(target, source);
    expect(codeOf(() => once.reset())).to.equal("GEN3003");

    const safe = Copy.safely(target, source);
    safe.transitionTo("matching");
    safe.transitionTo("failed");
    safe.reset();
    expect(safe.state).to.equal("created");
  });

  it("should choose aggregation by factory", () => {
    const source = readOnly(named("String"), "a");
    const target = readOnly(named("String"), "b");
    expect(Copy.to(target, source).aggregation).to.equal("firstSuccess");
    expect(Copy.merging(target, source).aggregation).to.equal("aggregateAny");
    expect(Copy.safely(target, source).safe).to.equal(true);
  });

  it("should read a successful conversion's result from its target", () => {
    const target = readWrite<string>(named("String"));
    const convert = Convert.to(target, readOnly(named("Number"), 7));
    convert.transitionTo("matching");
    convert.transitionTo("executing");
    target.setValue("7");
    convert.transitionTo("succeeded");
    expect(convert.getResult()).to.equal("7");
  });

  it("should compare operations structurally", () => {
    const position = readOnly(listOfString, ["a"]);
    expect(Size.of(position).sameAs(Size.of(position))).to.equal(true);
    expect(Size.of(position).sameAs(Size.of(readOnly(listOfString, ["a"])))).to.equal(false);
    expect(
      GetElementType.of(listOfString).sameAs(GetElementType.of(listOfString))
    ).to.equal(true);
    expect(
      Convert.to(writable(named("String")), position).sameAs(
        Convert.to(writable(named("String")), position)
      )
    ).to.equal(true);
  });

  it("should describe itself", () => {
    expect(GetElementType.of(wildcardExtends(listOfString)).describe()).to.equal(
      "Get element type of ? extends List<String>"
    );
  });
});
