/**
 * Runtime guards for values crossing position boundaries
 */

export const isObject = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

export const isIterable = (value: unknown): value is Iterable<unknown> =>
  isObject(value) && typeof Reflect.get(value, Symbol.iterator) === "function";

export const isIterator = (value: unknown): value is Iterator<unknown> =>
  isObject(value) && typeof Reflect.get(value, "next") === "function";

export const isMissing = (value: unknown): value is null | undefined =>
  value === null || value === undefined;
