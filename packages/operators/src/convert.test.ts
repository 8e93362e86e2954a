/**
 * Tests for the converters
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { isGenerisError, named, objectType } from "@generis/core";
import {
  Convert,
  createDispatchEngine,
  readOnly,
  readWrite,
  silentLogger,
  writable,
} from "@generis/engine";
import type { OperatorModule } from "@generis/engine";
import { CopyingConverter } from "./convert.js";
import { standardModule } from "./standard-module.js";
import { isIterator } from "./values.js";

const codeOf = (fn: () => unknown): string | undefined => {
  try {
    fn();
  } catch (err) {
    return isGenerisError(err) ? err.code : "not a GenerisError";
  }
  return undefined;
};

class Person {
  name = "";
  age = 0;
}

class Labelled {
  label: string;

  constructor(label?: string) {
    this.label = label ?? "";
  }
}

const peopleModule = (converter: CopyingConverter<Person>): OperatorModule => ({
  name: "people",
  entities: [
    { id: "test.Named", kind: "interface" },
    { id: "test.Person", implements: ["test.Named"], runtime: Person },
  ],
  operators: [converter],
});

describe("Converters", () => {
  describe("NopConverter", () => {
    const engine = createDispatchEngine({ modules: [standardModule()], logger: silentLogger });

    it("should pass through values the target type accepts", () => {
      const target = writable<string>(named("String"));
      expect(engine.eval(Convert.to(target, readOnly(named("String"), "abc")))).to.equal("abc");
    });

    it("should not convert values of another type", () => {
      const target = writable<number>(named("Number"));
      expect(engine.evalSuccess(Convert.to(target, readOnly(named("String"), "abc")))).to.equal(
        false
      );
    });
  });

  describe("IterableToIterator", () => {
    it("should write an iterator over the source", () => {
      const engine = createDispatchEngine({ modules: [standardModule()], logger: silentLogger });
      const target = readWrite<unknown>(named("Iterator", named("String")));
      const source = readOnly(named("List", named("String")), ["a", "b"]);

      expect(engine.evalSuccess(Convert.to(target, source))).to.equal(true);
      const iterator = target.getValue();
      expect(isIterator(iterator) ? iterator.next().value : undefined).to.equal("a");
    });
  });

  describe("CopyingConverter", () => {
    it("should create the target and copy the source onto it", () => {
      const engine = createDispatchEngine({
        modules: [
          standardModule(),
          peopleModule(CopyingConverter.forTargetType("test.Person", Person)),
        ],
        logger: silentLogger,
      });
      const person = engine.eval(
        Convert.to(
          writable<Person>(named("test.Person")),
          readOnly(objectType, { name: "Ann", age: 30 })
        )
      );

      expect(person).to.be.instanceOf(Person);
      expect(person.name).to.equal("Ann");
      expect(person.age).to.equal(30);
    });

    it("should create an implementation of an interface target", () => {
      const engine = createDispatchEngine({
        modules: [
          standardModule(),
          peopleModule(CopyingConverter.implementing("test.Named").with(Person)),
        ],
        logger: silentLogger,
      });
      const created = engine.eval(
        Convert.to(writable<unknown>(named("test.Named")), readOnly(objectType, { name: "Bo" }))
      );

      expect(created).to.be.instanceOf(Person);
      expect(created).to.deep.equal(Object.assign(new Person(), { name: "Bo" }));
    });

    it("should leave a missing source to other converters", () => {
      const engine = createDispatchEngine({
        modules: [
          standardModule(),
          peopleModule(CopyingConverter.forTargetType("test.Person", Person)),
        ],
        logger: silentLogger,
      });
      const convert = Convert.to(writable<Person>(named("test.Person")), readOnly(objectType, null));
      const ids = engine
        .createContext()
        .candidates(convert)
        .map((operator) => engine.catalog.entityOf(operator)?.id);
      expect(ids).to.deep.equal(["NopConverter"]);
    });

    it("should require a no-argument constructor", () => {
      expect(codeOf(() => CopyingConverter.forTargetType("test.Labelled", Labelled))).to.equal(
        "GEN1003"
      );
    });
  });
});
