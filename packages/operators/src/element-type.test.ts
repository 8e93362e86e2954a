/**
 * Tests for the element type operators
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { arrayOf, named } from "@generis/core";
import { createDispatchEngine, GetElementType, silentLogger } from "@generis/engine";
import { standardModule } from "./standard-module.js";

describe("Element type operators", () => {
  const engine = createDispatchEngine({ modules: [standardModule()], logger: silentLogger });

  it("should read the element type of an iterable", () => {
    expect(engine.eval(GetElementType.of(named("List", named("String"))))).to.deep.equal(
      named("String")
    );
  });

  it("should read the component type of an array", () => {
    expect(engine.eval(GetElementType.of(arrayOf(named("Number"))))).to.deep.equal(
      named("Number")
    );
  });

  it("should read the value type of a map", () => {
    const type = named("HashMap", named("String"), named("Number"));
    expect(engine.eval(GetElementType.of(type))).to.deep.equal(named("Number"));
  });

  it("should read the element type of an iterator", () => {
    expect(engine.eval(GetElementType.of(named("Iterator", named("Boolean"))))).to.deep.equal(
      named("Boolean")
    );
  });

  it("should fail for raw containers", () => {
    expect(engine.evalSuccess(GetElementType.of(named("ArrayList")))).to.equal(false);
  });
});
