/**
 * Position factories
 *
 * When a catalog is supplied, initial values are checked against the
 * position type (GEN3004 otherwise).
 */

import type { EntityCatalog, TypeExpression } from "@generis/core";
import { fail, formatType, isInstance } from "@generis/core";
import type { Readable, ReadWrite, Writable } from "./position.js";

const describeValue = (value: unknown): string => {
  if (typeof value === "string") return JSON.stringify(value);
  if (value === null || typeof value !== "object") return String(value);
  return value.constructor.name;
};

const requireInstance = (
  catalog: EntityCatalog | undefined,
  type: TypeExpression,
  value: unknown
): void => {
  if (catalog && !isInstance(catalog, value, type)) {
    fail(
      "GEN3004",
      `${describeValue(value)} is not an instance of ${formatType(type)}`
    );
  }
};

class ReadOnlyPosition<T> implements Readable<T> {
  constructor(
    private readonly type: TypeExpression,
    private readonly value: T
  ) {}

  getType(): TypeExpression {
    return this.type;
  }

  getValue(): T {
    return this.value;
  }

  toString(): string {
    return `Read-Only Position<${formatType(this.type)}>(${describeValue(this.value)})`;
  }
}

class ReadWritePosition<T> implements ReadWrite<T> {
  constructor(
    private readonly type: TypeExpression,
    private value: T
  ) {}

  getType(): TypeExpression {
    return this.type;
  }

  getValue(): T {
    return this.value;
  }

  setValue(value: T): void {
    this.value = value;
  }

  toString(): string {
    return `Read-Write Position<${formatType(this.type)}>(${describeValue(this.value)})`;
  }
}

/**
 * Type-only position used to ask hypothetical questions; it never holds a
 * value.
 */
class BoxPosition<T> implements Readable<T | undefined> {
  constructor(private readonly type: TypeExpression) {}

  getType(): TypeExpression {
    return this.type;
  }

  getValue(): T | undefined {
    return undefined;
  }

  toString(): string {
    return `Box<${formatType(this.type)}>`;
  }
}

export const readOnly = <T>(
  type: TypeExpression,
  value: T,
  catalog?: EntityCatalog
): Readable<T> => {
  requireInstance(catalog, type, value);
  return new ReadOnlyPosition(type, value);
};

/**
 * Read-only position typed by the value's own (raw) entity.
 */
export const readOnlyValue = <T>(catalog: EntityCatalog, value: T): Readable<T> => {
  if (value === null || value === undefined) {
    return fail(
      "GEN3004",
      "Cannot infer the type of a missing value",
      "Use readOnly(type, value) to give the position a type"
    );
  }
  return new ReadOnlyPosition(catalog.typeOf(value), value);
};

export function readWrite<T>(type: TypeExpression): ReadWrite<T | undefined>;
export function readWrite<T>(
  type: TypeExpression,
  initialValue: T,
  catalog?: EntityCatalog
): ReadWrite<T>;
export function readWrite<T>(
  type: TypeExpression,
  initialValue?: T,
  catalog?: EntityCatalog
): ReadWrite<T | undefined> {
  requireInstance(catalog, type, initialValue);
  return new ReadWritePosition<T | undefined>(type, initialValue);
}

export const writable = <T>(type: TypeExpression): Writable<T> =>
  new ReadWritePosition<T | undefined>(type, undefined);

export const box = <T>(type: TypeExpression): Readable<T | undefined> =>
  new BoxPosition<T>(type);
