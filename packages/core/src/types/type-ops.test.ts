/**
 * Tests for type expression operations
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  arrayOf,
  functionPlaceholder,
  named,
  placeholder,
  wildcardAll,
  wildcardExtends,
  wildcardSuper,
} from "./type-expression.js";
import {
  containsPlaceholder,
  formatPlaceholderDeclaration,
  formatType,
  placeholderKey,
  stableTypeKey,
  substitute,
  typesEqual,
} from "./type-ops.js";
import type { Substitution } from "./type-ops.js";

describe("Type Operations", () => {
  const string = named("String");
  const number = named("Number");

  describe("formatType", () => {
    it("should render nested type arguments", () => {
      const type = named(
        "Map",
        string,
        named("List", wildcardExtends(number))
      );
      expect(formatType(type)).to.equal("Map<String, List<? extends Number>>");
    });

    it("should render wildcards and arrays", () => {
      expect(formatType(wildcardAll)).to.equal("?");
      expect(formatType(wildcardSuper(string))).to.equal("? super String");
      expect(formatType(arrayOf(named("List", string)))).to.equal("List<String>[]");
    });

    it("should render placeholders by name", () => {
      expect(formatType(placeholder("E", "List"))).to.equal("E");
    });
  });

  describe("formatPlaceholderDeclaration", () => {
    it("should omit the implicit Object bound", () => {
      expect(
        formatPlaceholderDeclaration(placeholder("T", "Box", [named("Object")]))
      ).to.equal("T");
    });

    it("should render explicit bounds", () => {
      const t = placeholder("T", "Sorted");
      const bounded = placeholder("T", "Sorted", [named("Comparable", t)]);
      expect(formatPlaceholderDeclaration(bounded)).to.equal(
        "T extends Comparable<T>"
      );
    });
  });

  describe("typesEqual", () => {
    it("should compare named types structurally", () => {
      expect(typesEqual(named("List", string), named("List", string))).to.equal(true);
      expect(typesEqual(named("List", string), named("List", number))).to.equal(false);
      expect(typesEqual(named("List"), named("List", string))).to.equal(false);
    });

    it("should identify placeholders by name and declaring entity only", () => {
      expect(
        typesEqual(placeholder("T", "Box", [string]), placeholder("T", "Box"))
      ).to.equal(true);
      expect(typesEqual(placeholder("T", "Box"), placeholder("T", "Crate"))).to.equal(
        false
      );
    });

    it("should distinguish function placeholders from entity placeholders", () => {
      expect(
        typesEqual(placeholder("T", "identity"), functionPlaceholder("T", "identity"))
      ).to.equal(false);
      expect(placeholderKey(functionPlaceholder("T", "identity"))).to.equal(
        "fn:identity.T"
      );
    });

    it("should compare wildcard bounds", () => {
      expect(typesEqual(wildcardExtends(number), wildcardExtends(number))).to.equal(true);
      expect(typesEqual(wildcardExtends(number), wildcardSuper(number))).to.equal(false);
    });
  });

  it("should build stable keys", () => {
    expect(stableTypeKey(named("Map", string, arrayOf(number)))).to.equal(
      "n:Map<n:String,a:n:Number>"
    );
  });

  it("should detect nested placeholders", () => {
    const e = placeholder("E", "List");
    expect(containsPlaceholder(named("List", wildcardExtends(e)))).to.equal(true);
    expect(containsPlaceholder(named("List", string))).to.equal(false);
  });

  it("should substitute one level deep", () => {
    const k = placeholder("K", "Map");
    const v = placeholder("V", "Map");
    const map = new Map<string, Substitution>([
      [placeholderKey(k), { placeholder: k, type: string }],
      [placeholderKey(v), { placeholder: v, type: k }],
    ]);

    const result = substitute(named("Map", k, arrayOf(v)), map);

    expect(result).to.deep.equal(named("Map", string, arrayOf(k)));
  });
});
