/**
 * Operator signature matching
 *
 * An operator's declared operation type is computed once, at assembly: the
 * entity's binding of Operator.OPERATION with the operator's own
 * placeholders replaced by their per-instance resolution. For each
 * placeholder of that operation entity (and its ancestors below Operation)
 * the declared type is kept; at dispatch the operation's actual type at the
 * same placeholder must be assignable to it.
 */

import type {
  EntityDescriptor,
  NamedType,
  PlaceholderType,
  Resolver,
  TypeExpression,
} from "@generis/core";
import { fail, formatType, isSubEntity, mapPlaceholders, named } from "@generis/core";
import {
  OPERATION_ENTITY_ID,
  OPERATOR_ENTITY_ID,
  OPERATOR_PARAMETER,
} from "./entities.js";
import type { Operation } from "./operation.js";
import type { AnyOperator } from "./operator.js";

export type Expectation = {
  readonly placeholder: PlaceholderType;
  readonly declared: TypeExpression;
};

export type OperatorSignature = {
  readonly operator: AnyOperator;
  readonly entity: EntityDescriptor;
  readonly operationType: NamedType;
  readonly expectations: readonly Expectation[];
};

const operatorName = (entity: EntityDescriptor | undefined, operator: object): string =>
  entity?.id ?? operator.constructor.name;

export const operatorSignature = (
  resolver: Resolver,
  operator: AnyOperator
): OperatorSignature => {
  const { catalog } = resolver;
  const entity = catalog.entityOf(operator);
  if (!entity || !isSubEntity(catalog, entity.id, OPERATOR_ENTITY_ID)) {
    return fail(
      "GEN1005",
      `Operator '${operatorName(entity, operator)}' is not declared as an ${OPERATOR_ENTITY_ID} entity`,
      `Declare its class with implements: ["${OPERATOR_ENTITY_ID}<...>"]`
    );
  }

  const declared = resolver.resolve(
    operator,
    catalog.param(OPERATOR_ENTITY_ID, OPERATOR_PARAMETER)
  );
  if (
    declared === undefined ||
    declared.kind !== "named" ||
    !isSubEntity(catalog, declared.entityId, OPERATION_ENTITY_ID)
  ) {
    return fail(
      "GEN1005",
      `Operator '${entity.id}' does not declare an operation type`,
      declared === undefined
        ? `Bind ${OPERATOR_ENTITY_ID}.${OPERATOR_PARAMETER} in its declaration`
        : `${formatType(declared)} is not an ${OPERATION_ENTITY_ID}`
    );
  }

  const own = new Set(catalog.hierarchy(entity).map((e) => e.id));
  const bindOwn = (p: PlaceholderType): TypeExpression | undefined =>
    p.declarationKind === "entity" && own.has(p.declaringEntityId)
      ? resolver.resolve(operator, p)
      : undefined;
  const operationType = named(
    declared.entityId,
    ...declared.typeArguments.map((arg) => mapPlaceholders(arg, bindOwn))
  );

  const map = resolver.substitutionMap(operationType);
  const expectations: Expectation[] = [];
  for (const current of catalog.hierarchy(catalog.require(operationType.entityId))) {
    if (
      current.id === OPERATION_ENTITY_ID ||
      !isSubEntity(catalog, current.id, OPERATION_ENTITY_ID)
    ) {
      continue;
    }
    for (const placeholder of current.typeParameters) {
      const expected = resolver.unroll(map, placeholder);
      if (expected !== undefined) {
        expectations.push({ placeholder, declared: expected });
      }
    }
  }

  return { operator, entity, operationType, expectations };
};

/**
 * Whether `operation` fits the operator's declared operation type.
 * Placeholders either side leaves unresolved are not compared.
 */
export const matchesSignature = (
  resolver: Resolver,
  signature: OperatorSignature,
  operation: Operation<unknown>
): boolean => {
  const { catalog } = resolver;
  const entity = catalog.entityOf(operation);
  if (!entity || !isSubEntity(catalog, entity.id, signature.operationType.entityId)) {
    return false;
  }
  return signature.expectations.every(({ placeholder, declared }) => {
    const actual = operation.typeArgument(resolver, placeholder);
    return actual === undefined || resolver.isAssignable(actual, declared);
  });
};
