/**
 * Converters into lists and arrays
 *
 * A single value becomes a one-element list or array; an array (or, for
 * arrays, any iterable or iterator) contributes its elements. Every element
 * must be an instance of the target's element type.
 */

import type { TypeExpression } from "@generis/core";
import { isArrayOf } from "@generis/core";
import type { Convert, DispatchContext, Operator } from "@generis/engine";
import { isIterable, isIterator, isMissing } from "./values.js";

const elementTypeOf = (
  context: DispatchContext,
  type: TypeExpression,
  entityId: string,
  parameter: string
): TypeExpression | undefined => {
  const map = context.resolver.typeArguments(type, entityId);
  const bound =
    map === undefined
      ? undefined
      : context.resolver.unroll(map, context.catalog.param(entityId, parameter));
  return bound === undefined ? undefined : context.resolver.refine(bound);
};

const allInstances = (
  context: DispatchContext,
  elements: readonly unknown[],
  elementType: TypeExpression | undefined
): boolean =>
  elementType === undefined ||
  elements.every((element) => context.resolver.isInstance(element, elementType));

const complete = (convert: Convert<unknown, unknown>, value: unknown[]): boolean => {
  convert.getTargetPosition().setValue(value);
  convert.setResult(value);
  return true;
};

/**
 * `x` → `[x]`; an array → a new list of its elements.
 */
export class DefaultToListConverter implements Operator<Convert<unknown, unknown>> {
  private elements(convert: Convert<unknown, unknown>): unknown[] | undefined {
    const value = convert.getSourcePosition().getValue();
    if (isMissing(value)) return undefined;
    return Array.isArray(value) ? [...value] : [value];
  }

  supports(context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    const elements = this.elements(convert);
    return (
      elements !== undefined &&
      allInstances(
        context,
        elements,
        elementTypeOf(context, convert.getTargetPosition().getType(), "List", "E")
      )
    );
  }

  perform(context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    const elements = this.elements(convert);
    if (elements === undefined) return false;
    const elementType = elementTypeOf(
      context,
      convert.getTargetPosition().getType(),
      "List",
      "E"
    );
    return allInstances(context, elements, elementType) && complete(convert, elements);
  }
}

/**
 * `x` → `[x]`; arrays, iterables and iterators → a new array of their
 * elements.
 *
 * Iterators are only read by `perform`; until then their declared element
 * type stands in for the elements.
 */
export class DefaultToArrayConverter implements Operator<Convert<unknown, unknown>> {
  private componentType(
    context: DispatchContext,
    convert: Convert<unknown, unknown>
  ): TypeExpression | undefined {
    const type = convert.getTargetPosition().getType();
    return isArrayOf(type) ? context.resolver.refine(type.component) : undefined;
  }

  supports(context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    const component = this.componentType(context, convert);
    const source = convert.getSourcePosition();
    const value = source.getValue();
    if (component === undefined || isMissing(value)) return false;

    if (Array.isArray(value)) return allInstances(context, value, component);
    if (isIterator(value)) {
      const declared = elementTypeOf(context, source.getType(), "Iterator", "T");
      return declared === undefined || context.resolver.isAssignable(declared, component);
    }
    if (isIterable(value) && !(value instanceof Map)) {
      return allInstances(context, [...value], component);
    }
    return context.resolver.isInstance(value, component);
  }

  perform(context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    const component = this.componentType(context, convert);
    const value = convert.getSourcePosition().getValue();
    if (component === undefined || isMissing(value)) return false;

    let elements: unknown[];
    if (Array.isArray(value)) {
      elements = [...value];
    } else if (isIterator(value)) {
      elements = [];
      for (let step = value.next(); step.done !== true; step = value.next()) {
        elements.push(step.value);
      }
    } else if (isIterable(value) && !(value instanceof Map)) {
      elements = [...value];
    } else {
      elements = [value];
    }
    return allInstances(context, elements, component) && complete(convert, elements);
  }
}
