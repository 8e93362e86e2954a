/**
 * Type Text Parsing
 *
 * Parses declaration-side type texts into TypeExpression nodes.
 *
 * Grammar:
 *   type     := primary ("[" "]")*
 *   primary  := "?" [("extends" | "super") bounds] | name [typeArgs]
 *   typeArgs := "<" type ("," type)* ">"
 *   bounds   := type ("&" type)*
 *
 * Examples:
 * - "String" → named String
 * - "Map<K, List<V>>" → named Map [placeholder K, named List [placeholder V]]
 * - "? extends Number" → wildcard upper [Number]
 * - "T[]" → arrayOf placeholder T
 */

import { fail } from "../types/diagnostic.js";
import type {
  PlaceholderType,
  TypeExpression,
} from "../types/type-expression.js";
import { arrayOf, named, objectType, wildcard } from "../types/type-expression.js";

/**
 * Name resolution for the parser: placeholders in scope first, then entities.
 */
export type TypeNameScope = {
  readonly placeholder: (name: string) => PlaceholderType | undefined;
  /** Declared parameter count, or undefined for unknown entities */
  readonly arity: (entityId: string) => number | undefined;
};

type Token =
  | { readonly kind: "name"; readonly text: string }
  | { readonly kind: "punct"; readonly text: string };

const PUNCTUATION = new Set(["<", ">", ",", "?", "[", "]", "&"]);

const tokenize = (text: string): readonly Token[] => {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (PUNCTUATION.has(ch)) {
      tokens.push({ kind: "punct", text: ch });
      i++;
      continue;
    }
    const match = /^[A-Za-z_$][\w$.]*/.exec(text.slice(i));
    if (!match) {
      return fail(
        "GEN1005",
        `Unexpected character '${ch}' in type '${text}'`
      );
    }
    tokens.push({ kind: "name", text: match[0] });
    i += match[0].length;
  }
  return tokens;
};

export const parseTypeText = (
  text: string,
  scope: TypeNameScope
): TypeExpression => {
  const tokens = tokenize(text);
  let pos = 0;

  const peek = (): Token | undefined => tokens[pos];

  const isPunct = (value: string): boolean => {
    const token = peek();
    return token !== undefined && token.kind === "punct" && token.text === value;
  };

  const expectPunct = (value: string): void => {
    if (!isPunct(value)) {
      fail(
        "GEN1005",
        `Expected '${value}' at token ${pos} in type '${text}'`
      );
    }
    pos++;
  };

  const parseBounds = (): readonly TypeExpression[] => {
    const bounds: TypeExpression[] = [parseType()];
    while (isPunct("&")) {
      pos++;
      bounds.push(parseType());
    }
    return bounds;
  };

  const parsePrimary = (): TypeExpression => {
    const token = peek();
    if (token === undefined) {
      return fail("GEN1005", `Unexpected end of type '${text}'`);
    }

    if (token.kind === "punct") {
      if (token.text !== "?") {
        return fail(
          "GEN1005",
          `Unexpected '${token.text}' in type '${text}'`
        );
      }
      pos++;
      const next = peek();
      if (next?.kind === "name" && next.text === "extends") {
        pos++;
        return wildcard(parseBounds());
      }
      if (next?.kind === "name" && next.text === "super") {
        pos++;
        return wildcard([objectType], parseBounds());
      }
      return wildcard([objectType]);
    }

    pos++;
    const inScope = scope.placeholder(token.text);
    if (inScope) {
      if (isPunct("<")) {
        return fail(
          "GEN1005",
          `Placeholder '${token.text}' cannot take type arguments in '${text}'`
        );
      }
      return inScope;
    }

    const arity = scope.arity(token.text);
    if (arity === undefined) {
      return fail(
        "GEN1004",
        `Unknown entity '${token.text}' in type '${text}'`,
        "Declare the entity in the catalog before referring to it"
      );
    }

    const args: TypeExpression[] = [];
    if (isPunct("<")) {
      pos++;
      args.push(parseType());
      while (isPunct(",")) {
        pos++;
        args.push(parseType());
      }
      expectPunct(">");
    }

    if (args.length !== 0 && args.length !== arity) {
      return fail(
        "GEN1005",
        `'${token.text}' declares ${arity} type parameter(s) but ${args.length} were given in '${text}'`
      );
    }

    return named(token.text, ...args);
  };

  const parseType = (): TypeExpression => {
    let type = parsePrimary();
    while (isPunct("[")) {
      pos++;
      expectPunct("]");
      type = arrayOf(type);
    }
    return type;
  };

  const result = parseType();
  if (pos !== tokens.length) {
    return fail("GEN1005", `Trailing input in type '${text}'`);
  }
  return result;
};
