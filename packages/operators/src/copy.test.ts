/**
 * Tests for the copiers
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { named, objectType } from "@generis/core";
import { Copy, createDispatchEngine, readOnly, silentLogger } from "@generis/engine";
import { NullBehavior } from "./copy.js";
import { standardModule } from "./standard-module.js";

class Account {
  balance = 0;

  get id(): number {
    return 7;
  }
}

const stringToNumber = named("HashMap", named("String"), named("Number"));

describe("Copiers", () => {
  const engine = createDispatchEngine({ modules: [standardModule()], logger: silentLogger });

  describe("BeanCopier", () => {
    it("should copy the properties both beans share", () => {
      const target = { name: "", age: 0, extra: true };
      const copied = engine.evalSuccess(
        Copy.to(readOnly(objectType, target), readOnly(objectType, { name: "Ann", age: 30, other: 1 }))
      );

      expect(copied).to.equal(true);
      expect(target).to.deep.equal({ name: "Ann", age: 30, extra: true });
    });

    it("should skip read-only target properties", () => {
      const account = new Account();
      const copied = engine.evalSuccess(
        Copy.to(readOnly(objectType, account), readOnly(objectType, { balance: 10, id: 9 }))
      );

      expect(copied).to.equal(true);
      expect(account.balance).to.equal(10);
      expect(account.id).to.equal(7);
    });

    it("should fail when no property can be copied", () => {
      const target = { count: 0 };
      const copied = engine.evalSuccess(
        Copy.to(readOnly(objectType, target), readOnly(objectType, { count: "many" }))
      );

      expect(copied).to.equal(false);
      expect(target.count).to.equal(0);
    });

    describe("with a missing source", () => {
      const nullCopy = (target: { name: string | null }): Copy<null, { name: string | null }> =>
        Copy.to(readOnly(objectType, target), readOnly(objectType, null));

      it("should leave the target alone by default", () => {
        const target = { name: "Bob" };
        expect(engine.evalSuccess(nullCopy(target))).to.equal(true);
        expect(target.name).to.equal("Bob");
      });

      it("should not be supported when hinted unsupported", () => {
        const context = engine.createContext();
        const copied = context.withHints([NullBehavior.of("unsupported")], () =>
          context.evalSuccess(nullCopy({ name: "Bob" }))
        );
        expect(copied).to.equal(false);
      });

      it("should write nulls when hinted setNulls", () => {
        const context = engine.createContext();
        const target: { name: string | null } = { name: "Bob" };
        context.withHints([NullBehavior.of("setNulls")], () => context.evalSuccess(nullCopy(target)));
        expect(target.name).to.equal(null);
      });

      it("should read the behavior from configuration", () => {
        const configured = createDispatchEngine({
          modules: [standardModule()],
          config: { hints: { nullBehavior: "setNulls" } },
          logger: silentLogger,
        });
        const target: { name: string | null } = { name: "Bob" };
        expect(configured.evalSuccess(nullCopy(target))).to.equal(true);
        expect(target.name).to.equal(null);
      });
    });
  });

  describe("MapCopier", () => {
    it("should add every converted entry to the target map", () => {
      const target = new Map<string, number>();
      const source = new Map([
        ["a", 1],
        ["b", 2],
      ]);
      const copied = engine.evalSuccess(
        Copy.to(readOnly(stringToNumber, target), readOnly(stringToNumber, source))
      );

      expect(copied).to.equal(true);
      expect([...target.entries()]).to.deep.equal([
        ["a", 1],
        ["b", 2],
      ]);
    });

    it("should refuse entries it cannot convert", () => {
      const target = new Map<string, number>();
      const source = new Map([["a", "one"]]);
      const copied = engine.evalSuccess(
        Copy.to(
          readOnly(stringToNumber, target),
          readOnly(named("HashMap", named("String"), named("String")), source)
        )
      );

      expect(copied).to.equal(false);
      expect(target.size).to.equal(0);
    });
  });

  describe("BeanToMapCopier", () => {
    it("should copy each property under its name", () => {
      const target = new Map<string, unknown>();
      const copied = engine.evalSuccess(
        Copy.to(
          readOnly(named("HashMap", named("String"), objectType), target),
          readOnly(objectType, { name: "Ann", class: "Person", age: 30 })
        )
      );

      expect(copied).to.equal(true);
      expect([...target.entries()]).to.deep.equal([
        ["name", "Ann"],
        ["age", 30],
      ]);
    });

    it("should skip properties the value type refuses", () => {
      const target = new Map<string, number>();
      const copied = engine.evalSuccess(
        Copy.to(readOnly(stringToNumber, target), readOnly(objectType, { name: "Ann", age: 30 }))
      );

      expect(copied).to.equal(true);
      expect([...target.entries()]).to.deep.equal([["age", 30]]);
    });
  });
});
