import { describe, it } from "mocha";
import { expect } from "chai";
import { named, objectType } from "@generis/core";
import { createDispatchEngine, ImmutableCheck, readOnly, silentLogger } from "@generis/engine";
import { standardModule } from "./standard-module.js";

describe("DefaultImmutableChecker", () => {
  const engine = createDispatchEngine({ modules: [standardModule()], logger: silentLogger });

  it("should accept primitives and missing values", () => {
    expect(engine.eval(ImmutableCheck.of(readOnly(named("String"), "x")))).to.equal(true);
    expect(engine.eval(ImmutableCheck.of(readOnly(objectType, null)))).to.equal(true);
  });

  it("should accept frozen objects", () => {
    expect(engine.eval(ImmutableCheck.of(readOnly(objectType, Object.freeze({ a: 1 }))))).to.equal(
      true
    );
  });

  it("should fail for mutable objects", () => {
    expect(engine.evalSuccess(ImmutableCheck.of(readOnly(objectType, { a: 1 })))).to.equal(false);
  });
});
