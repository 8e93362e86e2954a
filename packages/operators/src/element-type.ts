/**
 * Element type operators
 *
 * Each reads the type argument of one container entity. An element type
 * the position's type leaves unbound (raw containers) is a failure.
 */

import type { TypeExpression } from "@generis/core";
import { isArrayOf } from "@generis/core";
import type { DispatchContext, GetElementType, Operator } from "@generis/engine";
import { OptimisticOperator } from "@generis/engine";

const typeArgumentOf = (
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

const setElementType = (
  operation: GetElementType<unknown>,
  elementType: TypeExpression | undefined
): boolean => {
  if (elementType === undefined) return false;
  operation.setResult(elementType);
  return true;
};

export class GetArrayElementType implements Operator<GetElementType<unknown>> {
  supports(_context: DispatchContext, operation: GetElementType<unknown>): boolean {
    return isArrayOf(operation.getTypedItem().getType());
  }

  perform(_context: DispatchContext, operation: GetElementType<unknown>): boolean {
    const type = operation.getTypedItem().getType();
    return isArrayOf(type) && setElementType(operation, type.component);
  }
}

export class GetIterableElementType extends OptimisticOperator<GetElementType<unknown>> {
  perform(context: DispatchContext, operation: GetElementType<unknown>): boolean {
    return setElementType(
      operation,
      typeArgumentOf(context, operation.getTypedItem().getType(), "Iterable", "T")
    );
  }
}

export class GetIteratorElementType extends OptimisticOperator<GetElementType<unknown>> {
  perform(context: DispatchContext, operation: GetElementType<unknown>): boolean {
    return setElementType(
      operation,
      typeArgumentOf(context, operation.getTypedItem().getType(), "Iterator", "T")
    );
  }
}

/** The value type of a map */
export class GetMapElementType extends OptimisticOperator<GetElementType<unknown>> {
  perform(context: DispatchContext, operation: GetElementType<unknown>): boolean {
    return setElementType(
      operation,
      typeArgumentOf(context, operation.getTypedItem().getType(), "Map", "V")
    );
  }
}
