/**
 * Tests for the list and array converters
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { arrayOf, named, objectType } from "@generis/core";
import { Convert, createDispatchEngine, readOnly, silentLogger, writable } from "@generis/engine";
import { DefaultToListConverter } from "./convert-to-collection.js";
import { STANDARD_OPERATOR_ENTITIES } from "./entities.js";
import { standardModule } from "./standard-module.js";

const string = named("String");
const WORDS = ["foo", "bar", "baz"];

class Words implements Iterable<string> {
  [Symbol.iterator](): Iterator<string> {
    return WORDS[Symbol.iterator]();
  }
}

describe("Collection converters", () => {
  const engine = createDispatchEngine({ modules: [standardModule()], logger: silentLogger });

  describe("DefaultToListConverter", () => {
    it("should wrap a single value", () => {
      const list = engine.eval(Convert.to(writable<unknown>(named("List", string)), readOnly(string, "foo")));
      expect(list).to.deep.equal(["foo"]);
    });

    it("should copy the elements of an array into a new list", () => {
      const listsOnly = createDispatchEngine({
        modules: [
          {
            name: "lists",
            entities: STANDARD_OPERATOR_ENTITIES,
            operators: [new DefaultToListConverter()],
          },
        ],
        logger: silentLogger,
      });
      const source = ["foo", "bar"];
      const list = listsOnly.eval(
        Convert.to(writable<unknown>(named("List", string)), readOnly(arrayOf(string), source))
      );

      expect(list).to.deep.equal(["foo", "bar"]);
      expect(list).to.not.equal(source);
    });

    it("should refuse elements of another type", () => {
      expect(
        engine.evalSuccess(
          Convert.to(writable<unknown>(named("List", named("Number"))), readOnly(string, "foo"))
        )
      ).to.equal(false);
    });
  });

  describe("DefaultToArrayConverter", () => {
    it("should wrap a single value", () => {
      expect(engine.eval(Convert.to(writable<unknown>(arrayOf(string)), readOnly(string, "foo")))).to.deep.equal(
        ["foo"]
      );
      expect(
        engine.eval(Convert.to(writable<unknown>(arrayOf(objectType)), readOnly(string, "foo")))
      ).to.deep.equal(["foo"]);
    });

    it("should collect the elements of an iterable", () => {
      const array = engine.eval(
        Convert.to(writable<unknown>(arrayOf(string)), readOnly(named("Iterable", string), new Words()))
      );
      expect(array).to.deep.equal(WORDS);
    });

    it("should drain an iterator", () => {
      const array = engine.eval(
        Convert.to(
          writable<unknown>(arrayOf(string)),
          readOnly(named("Iterator", string), WORDS[Symbol.iterator]())
        )
      );
      expect(array).to.deep.equal(WORDS);
    });

    it("should refuse values of another type", () => {
      expect(
        engine.evalSuccess(Convert.to(writable<unknown>(arrayOf(string)), readOnly(named("Number"), 1)))
      ).to.equal(false);
    });
  });
});
