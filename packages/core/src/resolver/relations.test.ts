/**
 * Tests for assignability and instance checks
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createEntityCatalog } from "../catalog/catalog.js";
import {
  arrayOf,
  named,
  objectType,
  wildcardAll,
  wildcardExtends,
  wildcardSuper,
} from "../types/type-expression.js";
import { formatType } from "../types/type-ops.js";
import { getTypeArguments, isAssignable, isInstance } from "./relations.js";

describe("Type Relations", () => {
  const catalog = createEntityCatalog();
  const string = named("String");
  const number = named("Number");
  const listOfString = named("List", string);

  describe("isAssignable", () => {
    it("should follow interfaces with wildcard arguments", () => {
      expect(isAssignable(catalog, listOfString, named("Collection", wildcardAll))).to.equal(
        true
      );
      expect(isAssignable(catalog, listOfString, named("Iterable", wildcardAll))).to.equal(
        true
      );
      expect(isAssignable(catalog, listOfString, named("Iterator", wildcardAll))).to.equal(
        false
      );
    });

    it("should keep type arguments invariant", () => {
      expect(
        isAssignable(catalog, named("ArrayList", string), listOfString)
      ).to.equal(true);
      expect(
        isAssignable(catalog, named("ArrayList", string), named("List", objectType))
      ).to.equal(false);
      expect(
        isAssignable(catalog, named("ArrayList", string), named("List", number))
      ).to.equal(false);
    });

    it("should check wildcard bounds", () => {
      expect(
        isAssignable(catalog, listOfString, named("List", wildcardExtends(objectType)))
      ).to.equal(true);
      expect(
        isAssignable(catalog, named("List", objectType), named("List", wildcardSuper(string)))
      ).to.equal(true);
      expect(
        isAssignable(catalog, named("List", number), named("List", wildcardSuper(string)))
      ).to.equal(false);
    });

    it("should accept raw types on either side", () => {
      expect(isAssignable(catalog, named("ArrayList"), listOfString)).to.equal(true);
      expect(isAssignable(catalog, listOfString, named("Collection"))).to.equal(true);
    });

    it("should treat arrays as covariant and assignable to Object", () => {
      expect(
        isAssignable(catalog, arrayOf(named("ArrayList", string)), arrayOf(listOfString))
      ).to.equal(true);
      expect(isAssignable(catalog, arrayOf(string), objectType)).to.equal(true);
      expect(isAssignable(catalog, arrayOf(string), listOfString)).to.equal(false);
    });

    it("should check placeholder sources through their bounds", () => {
      const e = catalog.param("List", "E");
      expect(isAssignable(catalog, e, objectType)).to.equal(true);
      expect(isAssignable(catalog, e, string)).to.equal(false);
    });
  });

  describe("getTypeArguments", () => {
    it("should expose ancestor assignments", () => {
      const map = getTypeArguments(catalog, named("ArrayList", string), "Iterable");
      const entries = [...(map?.values() ?? [])].map(
        (s) => `${s.placeholder.declaringEntityId}.${s.placeholder.name}=${formatType(s.type)}`
      );
      expect(entries).to.include("ArrayList.E=String");
      expect(entries).to.include("Iterable.T=E");
    });

    it("should return undefined for unrelated entities", () => {
      expect(getTypeArguments(catalog, listOfString, "Map")).to.equal(undefined);
    });
  });

  describe("isInstance", () => {
    it("should check runtime values against entities", () => {
      expect(isInstance(catalog, "text", string)).to.equal(true);
      expect(isInstance(catalog, 42, string)).to.equal(false);
      expect(isInstance(catalog, [1, 2], listOfString)).to.equal(true);
      expect(isInstance(catalog, new Map(), named("Map"))).to.equal(true);
      expect(isInstance(catalog, new Map(), named("Collection"))).to.equal(false);
    });

    it("should accept null for non-primitive types only", () => {
      expect(isInstance(catalog, null, listOfString)).to.equal(true);
      expect(isInstance(catalog, undefined, string)).to.equal(false);
    });

    it("should check array elements", () => {
      expect(isInstance(catalog, [1, 2], arrayOf(number))).to.equal(true);
      expect(isInstance(catalog, [1, "2"], arrayOf(number))).to.equal(false);
    });
  });
});
