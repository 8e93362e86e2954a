/**
 * Add operators
 */

import type { TypeExpression } from "@generis/core";
import { isNamed, isSubEntity } from "@generis/core";
import type { AddAll, DispatchContext, Operator } from "@generis/engine";
import { Add, readOnly } from "@generis/engine";
import { isIterable, isObject } from "./values.js";

export interface MapEntry<K, V> {
  readonly key: K;
  readonly value: V;
}

export class SimpleEntry<K, V> implements MapEntry<K, V> {
  constructor(
    readonly key: K,
    readonly value: V
  ) {}

  toString(): string {
    return `${String(this.key)}=${String(this.value)}`;
  }
}

export const isMapEntry = (value: unknown): value is MapEntry<unknown, unknown> =>
  isObject(value) && "key" in value && "value" in value;

const elementTypeOf = (
  context: DispatchContext,
  type: TypeExpression,
  entityId: string,
  parameter: string
): TypeExpression | undefined => {
  const map = context.resolver.typeArguments(type, entityId);
  return map === undefined
    ? undefined
    : context.resolver.unroll(map, context.catalog.param(entityId, parameter));
};

const isGrowable = (value: unknown): value is unknown[] | Set<unknown> =>
  (Array.isArray(value) || value instanceof Set) && !Object.isFrozen(value);

/**
 * Arrays and sets. The element must fit the collection's element type when
 * the target type declares one.
 */
export class AddToCollection implements Operator<Add<unknown, unknown>> {
  supports(context: DispatchContext, add: Add<unknown, unknown>): boolean {
    const target = add.getTargetPosition();
    if (!isGrowable(target.getValue())) return false;

    const elementType = elementTypeOf(context, target.getType(), "Collection", "E");
    return (
      elementType === undefined ||
      context.resolver.isAssignable(add.getSourcePosition().getType(), elementType)
    );
  }

  perform(_context: DispatchContext, add: Add<unknown, unknown>): boolean {
    const collection = add.getTargetPosition().getValue();
    const element = add.getSourcePosition().getValue();
    if (Array.isArray(collection)) {
      collection.push(element);
      add.setResult(true);
      return true;
    }
    if (collection instanceof Set) {
      const before = collection.size;
      collection.add(element);
      add.setResult(collection.size !== before);
      return true;
    }
    return false;
  }
}

export class AddEntryToMap implements Operator<Add<unknown, unknown>> {
  supports(_context: DispatchContext, add: Add<unknown, unknown>): boolean {
    const map = add.getTargetPosition().getValue();
    return (
      map instanceof Map &&
      !Object.isFrozen(map) &&
      isMapEntry(add.getSourcePosition().getValue())
    );
  }

  perform(_context: DispatchContext, add: Add<unknown, unknown>): boolean {
    const map = add.getTargetPosition().getValue();
    const entry = add.getSourcePosition().getValue();
    if (!(map instanceof Map) || !isMapEntry(entry)) return false;
    const changed = !map.has(entry.key) || !Object.is(map.get(entry.key), entry.value);
    map.set(entry.key, entry.value);
    add.setResult(changed);
    return true;
  }
}

/**
 * Forwards an `Add` per element, after checking that the target takes every
 * one of them. Elements are typed by the source's element type; elements of
 * a raw source by their own entity, parameterized like the target's element
 * type where the entity descends from it.
 */
export class AddAllFromIterable implements Operator<AddAll<unknown, unknown>> {
  private additions(
    context: DispatchContext,
    addAll: AddAll<unknown, unknown>
  ): readonly Add<unknown, unknown>[] | undefined {
    const source = addAll.getSourcePosition();
    const iterable = source.getValue();
    if (!isIterable(iterable)) return undefined;
    // Snapshot: the target may be the source
    const elements = [...iterable];

    const target = addAll.getTargetPosition();
    const declared = elementTypeOf(context, source.getType(), "Iterable", "T");
    const targetElement = elementTypeOf(context, target.getType(), "Collection", "E");
    const typeOf = (element: unknown): TypeExpression => {
      if (declared !== undefined) return context.resolver.refine(declared);
      const entity = context.catalog.entityOf(element);
      if (
        entity !== undefined &&
        targetElement !== undefined &&
        isNamed(targetElement) &&
        isSubEntity(context.catalog, entity.id, targetElement.entityId)
      ) {
        return context.resolver.narrowestParameterizedType(entity, targetElement);
      }
      return context.catalog.typeOf(element);
    };

    return elements.map((element) => Add.to(target, readOnly(typeOf(element), element)));
  }

  supports(context: DispatchContext, addAll: AddAll<unknown, unknown>): boolean {
    const additions = this.additions(context, addAll);
    return additions !== undefined && additions.every((add) => context.supports(add));
  }

  perform(context: DispatchContext, addAll: AddAll<unknown, unknown>): boolean {
    const additions = this.additions(context, addAll);
    if (additions === undefined) return false;

    let changed = false;
    for (const add of additions) {
      const added = context.forwardTo(add, (result) => {
        changed = result || changed;
      });
      if (!added) return false;
    }
    addAll.setResult(changed);
    return true;
  }
}
