/**
 * Tests for property copiers
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { isGenerisError, named } from "@generis/core";
import type { OperatorModule } from "@generis/engine";
import { Copy, createDispatchEngine, readOnly, silentLogger } from "@generis/engine";
import { NullBehavior } from "./copy.js";
import { PropertyCopier } from "./property-copier.js";
import { standardModule } from "./standard-module.js";

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

class Contact {
  fullName: string | null = "";
  age = 0;
  note = "";
}

class PersonToContact extends PropertyCopier {
  constructor() {
    super({ mapping: [{ from: "name", to: "fullName" }], matching: {} });
  }
}

class PersonWithoutAge extends PropertyCopier {
  constructor() {
    super({ matching: { exclude: ["age"] } });
  }
}

class Unconfigured extends PropertyCopier {
  constructor() {
    super({});
  }
}

class EmptyMapping extends PropertyCopier {
  constructor() {
    super({ mapping: [] });
  }
}

class BlankMapping extends PropertyCopier {
  constructor() {
    super({ mapping: [{ from: " ", to: "" }] });
  }
}

const peopleModule: OperatorModule = {
  name: "people",
  entities: [
    { id: "test.Person", runtime: Person },
    { id: "test.Contact", runtime: Contact },
    {
      id: "test.PersonToContact",
      extends: "PropertyCopier<test.Person, test.Contact>",
      runtime: PersonToContact,
    },
    {
      id: "test.PersonWithoutAge",
      extends: "PropertyCopier<test.Person, test.Person>",
      runtime: PersonWithoutAge,
    },
  ],
  operators: [new PersonToContact(), new PersonWithoutAge()],
  precedence: [
    ["BeanCopier", "test.PersonToContact"],
    ["BeanCopier", "test.PersonWithoutAge"],
  ],
};

const person = (name: string, age: number): Person => Object.assign(new Person(), { name, age });
const contact = (fullName: string): Contact => Object.assign(new Contact(), { fullName });

const contactType = named("test.Contact");
const personType = named("test.Person");

describe("PropertyCopier", () => {
  const engine = createDispatchEngine({
    modules: [standardModule(), peopleModule],
    logger: silentLogger,
  });

  it("should copy mapped properties and match the rest", () => {
    const target = contact("");
    const copied = engine.evalSuccess(
      Copy.to(readOnly(contactType, target), readOnly(personType, person("Ann", 30)))
    );

    expect(copied).to.equal(true);
    expect(target).to.deep.equal(Object.assign(new Contact(), { fullName: "Ann", age: 30 }));
  });

  it("should leave excluded properties alone", () => {
    const target = person("", 0);
    const copied = engine.evalSuccess(
      Copy.to(readOnly(personType, target), readOnly(personType, person("Ann", 30)))
    );

    expect(copied).to.equal(true);
    expect(target).to.deep.equal(person("Ann", 0));
  });

  describe("with a missing source", () => {
    const nullCopy = (target: Contact): Copy<null, Contact> =>
      Copy.to(readOnly(contactType, target), readOnly(personType, null));

    it("should leave the target alone by default", () => {
      const target = contact("Bob");
      expect(engine.evalSuccess(nullCopy(target))).to.equal(true);
      expect(target.fullName).to.equal("Bob");
    });

    it("should write nulls to mapped properties when hinted setNulls", () => {
      const context = engine.createContext();
      const target = contact("Bob");
      const copied = context.withHints([NullBehavior.of("setNulls")], () =>
        context.evalSuccess(nullCopy(target))
      );

      expect(copied).to.equal(true);
      expect(target.fullName).to.equal(null);
      expect(target.age).to.equal(0);
    });

    it("should not be supported when hinted unsupported", () => {
      const context = engine.createContext();
      const copied = context.withHints([NullBehavior.of("unsupported")], () =>
        context.evalSuccess(nullCopy(contact("Bob")))
      );
      expect(copied).to.equal(false);
    });
  });

  it("should reject definitions without mappings to apply", () => {
    expect(codeOf(() => new Unconfigured())).to.equal("GEN1005");
    expect(codeOf(() => new EmptyMapping())).to.equal("GEN1005");
    expect(codeOf(() => new BlankMapping())).to.equal("GEN1005");
  });
});
