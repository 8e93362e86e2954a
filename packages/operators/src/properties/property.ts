/**
 * Property positions
 *
 *   const properties = createProperties(catalog);
 *   properties.at("name").of(personPosition)        // must have a parent value
 *   properties.optional("name").of(personPosition)  // reads undefined otherwise
 */

import type { EntityCatalog, TypeExpression } from "@generis/core";
import { fail, objectType } from "@generis/core";
import type { Readable } from "@generis/engine";
import { RelativePosition } from "@generis/engine";
import type { PropertyResolver } from "./property-resolver.js";
import { defaultPropertyResolver } from "./property-resolver.js";

export type PropertyAccess = {
  readonly catalog: EntityCatalog;
  readonly resolver: PropertyResolver;
};

export class PropertyPosition<P> extends RelativePosition<P, unknown> {
  constructor(
    parent: Readable<P>,
    name: string,
    private readonly access: PropertyAccess,
    readonly optional: boolean
  ) {
    super(parent, name);
  }

  private parentValue(): object | undefined {
    const value = this.parent.getValue();
    return this.access.resolver.handles(value) ? value : undefined;
  }

  private requireParent(action: string): object {
    const value = this.parentValue();
    if (value === undefined) {
      return fail(
        "GEN3004",
        `Cannot ${action} property '${this.key}': ${String(this.parent)} holds no object`
      );
    }
    return value;
  }

  getType(): TypeExpression {
    const value = this.parentValue();
    if (value === undefined) return objectType;
    return this.access.resolver.getType(this.access.catalog, value, this.key) ?? objectType;
  }

  getValue(): unknown {
    const value = this.optional ? this.parentValue() : this.requireParent("read");
    return value === undefined ? undefined : this.access.resolver.getValue(value, this.key);
  }

  setValue(propertyValue: unknown): void {
    const value = this.requireParent("write");
    if (this.access.resolver.isReadOnly(value, this.key)) {
      fail("GEN3004", `Property '${this.key}' of ${String(this.parent)} is read-only`);
    }
    this.access.resolver.setValue(value, this.key, propertyValue);
  }

  isReadOnly(): boolean {
    const value = this.parentValue();
    return value === undefined || this.access.resolver.isReadOnly(value, this.key);
  }

  toString(): string {
    return `Property ${this.key} of ${String(this.parent)}`;
  }
}

export type PropertyPositionFactory = {
  readonly propertyName: string;
  readonly of: <P>(parent: Readable<P>) => PropertyPosition<P>;
};

export type Properties = {
  readonly catalog: EntityCatalog;
  readonly resolver: PropertyResolver;
  readonly at: (name: string) => PropertyPositionFactory;
  readonly optional: (name: string) => PropertyPositionFactory;
  /** Property names of the position's value; empty without a value */
  readonly names: (position: Readable<unknown>) => readonly string[];
  readonly writableNames: (position: Readable<unknown>) => readonly string[];
};

export const createProperties = (
  catalog: EntityCatalog,
  resolver: PropertyResolver = defaultPropertyResolver
): Properties => {
  const access: PropertyAccess = { catalog, resolver };

  const factory = (name: string, optional: boolean): PropertyPositionFactory => ({
    propertyName: name,
    of: <P>(parent: Readable<P>): PropertyPosition<P> =>
      new PropertyPosition(parent, name, access, optional),
  });

  const names = (position: Readable<unknown>): readonly string[] => {
    const value = position.getValue();
    return resolver.handles(value) ? resolver.getPropertyNames(value) : [];
  };

  return {
    catalog,
    resolver,
    at: (name) => factory(name, false),
    optional: (name) => factory(name, true),
    names,
    writableNames: (position) => {
      const value = position.getValue();
      return resolver.handles(value)
        ? resolver.getPropertyNames(value).filter((name) => !resolver.isReadOnly(value, name))
        : [];
    },
  };
};
