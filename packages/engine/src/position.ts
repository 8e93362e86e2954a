/**
 * Positions - typed holders of values read or written by operations
 *
 * The resolver and the dispatch engine depend only on these contracts.
 */

import type { TypeExpression } from "@generis/core";
import { typesEqual } from "@generis/core";

/**
 * `T` is the value type the position holds; `getType()` is the same type as
 * the catalog sees it.
 */
export interface Position<T> {
  getType(): TypeExpression;
}

export interface Readable<T> extends Position<T> {
  getValue(): T;
}

export interface Writable<T> extends Position<T> {
  setValue(value: T): void;
}

export interface ReadWrite<T> extends Readable<T>, Writable<T> {}

export const isReadable = <T>(position: Position<T>): position is Readable<T> =>
  typeof Reflect.get(position, "getValue") === "function";

export const isWritable = <T>(position: Position<T>): position is Writable<T> =>
  typeof Reflect.get(position, "setValue") === "function";

/**
 * Position whose value is found relative to a parent position
 * (e.g. a property of the parent's value).
 */
export abstract class RelativePosition<P, T> implements ReadWrite<T> {
  protected constructor(
    readonly parent: Readable<P>,
    readonly key: string
  ) {}

  abstract getType(): TypeExpression;
  abstract getValue(): T;
  abstract setValue(value: T): void;
}

/**
 * Structural identity used by the re-entrancy guard: the same object; or
 * relative positions of one kind at the same key of equal parents; or
 * positions of one kind with equal types holding the same value.
 */
export const positionsEqual = (
  a: Position<unknown>,
  b: Position<unknown>
): boolean => {
  if (a === b) return true;
  if (a.constructor !== b.constructor) return false;

  if (a instanceof RelativePosition && b instanceof RelativePosition) {
    return a.key === b.key && positionsEqual(a.parent, b.parent);
  }

  return (
    isReadable(a) &&
    isReadable(b) &&
    typesEqual(a.getType(), b.getType()) &&
    Object.is(a.getValue(), b.getValue())
  );
};
