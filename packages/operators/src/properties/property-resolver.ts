/**
 * Property introspection
 *
 * Resolvers are consulted in order; the first that handles a value answers
 * every question about its properties.
 */

import type { EntityCatalog, TypeExpression } from "@generis/core";
import { isObject, isMissing } from "../values.js";

export interface PropertyResolver {
  handles(value: unknown): value is object;
  getPropertyNames(value: object): readonly string[];
  /** Type of the property's current value; undefined when unknown */
  getType(catalog: EntityCatalog, value: object, name: string): TypeExpression | undefined;
  isReadOnly(value: object, name: string): boolean;
  getValue(value: object, name: string): unknown;
  setValue(value: object, name: string, propertyValue: unknown): void;
}

const typeOfValue = (
  catalog: EntityCatalog,
  value: unknown
): TypeExpression | undefined => (isMissing(value) ? undefined : catalog.typeOf(value));

/**
 * Map entries under string keys.
 */
export const mapPropertyResolver: PropertyResolver = {
  handles: (value): value is object => value instanceof Map,
  getPropertyNames: (value) =>
    value instanceof Map
      ? [...value.keys()].filter((key): key is string => typeof key === "string")
      : [],
  getType: (catalog, value, name) =>
    typeOfValue(catalog, value instanceof Map ? value.get(name) : undefined),
  isReadOnly: (value) => Object.isFrozen(value),
  getValue: (value, name) => (value instanceof Map ? value.get(name) : undefined),
  setValue: (value, name, propertyValue) => {
    if (value instanceof Map) value.set(name, propertyValue);
  },
};

const findDescriptor = (
  value: object,
  name: string
): PropertyDescriptor | undefined => {
  let current: object | null = value;
  while (current !== null && current !== Object.prototype) {
    const descriptor = Object.getOwnPropertyDescriptor(current, name);
    if (descriptor) return descriptor;
    current = Object.getPrototypeOf(current);
  }
  return undefined;
};

/**
 * Own enumerable fields plus accessors declared on the prototype chain.
 */
export const plainObjectPropertyResolver: PropertyResolver = {
  handles: (value): value is object =>
    isObject(value) &&
    typeof value !== "function" &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Set),
  getPropertyNames: (value) => {
    const names = new Set(Object.keys(value));
    let proto: object | null = Object.getPrototypeOf(value);
    while (proto !== null && proto !== Object.prototype) {
      for (const [name, descriptor] of Object.entries(
        Object.getOwnPropertyDescriptors(proto)
      )) {
        if (name !== "constructor" && (descriptor.get || descriptor.set)) {
          names.add(name);
        }
      }
      proto = Object.getPrototypeOf(proto);
    }
    return [...names];
  },
  getType: (catalog, value, name) => typeOfValue(catalog, Reflect.get(value, name)),
  isReadOnly: (value, name) => {
    if (Object.isFrozen(value)) return true;
    const descriptor = findDescriptor(value, name);
    if (!descriptor) return !Object.isExtensible(value);
    return descriptor.get || descriptor.set
      ? descriptor.set === undefined
      : descriptor.writable !== true;
  },
  getValue: (value, name) => Reflect.get(value, name),
  setValue: (value, name, propertyValue) => {
    Reflect.set(value, name, propertyValue);
  },
};

/**
 * Resolver delegating to the first of `resolvers` that handles a value.
 */
export const createPropertyResolverChain = (
  resolvers: readonly PropertyResolver[]
): PropertyResolver => {
  const find = (value: unknown): PropertyResolver | undefined =>
    resolvers.find((resolver) => resolver.handles(value));

  return {
    handles: (value): value is object => find(value) !== undefined,
    getPropertyNames: (value) => find(value)?.getPropertyNames(value) ?? [],
    getType: (catalog, value, name) => find(value)?.getType(catalog, value, name),
    isReadOnly: (value, name) => find(value)?.isReadOnly(value, name) ?? true,
    getValue: (value, name) => find(value)?.getValue(value, name),
    setValue: (value, name, propertyValue) => {
      find(value)?.setValue(value, name, propertyValue);
    },
  };
};

export const defaultPropertyResolver: PropertyResolver = createPropertyResolverChain([
  mapPropertyResolver,
  plainObjectPropertyResolver,
]);
