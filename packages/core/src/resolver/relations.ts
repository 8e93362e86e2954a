/**
 * Type relations - type arguments along a hierarchy, assignability, instances
 *
 * DAG position: depends on assignments only
 */

import type { EntityCatalog, EntityLookup } from "../catalog/types.js";
import type { NamedType, TypeExpression } from "../types/type-expression.js";
import { objectType, ROOT_ENTITY_ID } from "../types/type-expression.js";
import type { SubstitutionMap } from "../types/type-ops.js";
import { typesEqual } from "../types/type-ops.js";
import { collectAssignments, unrollVariables } from "./assignments.js";

const firstUpperBound = (bounds: readonly TypeExpression[]): TypeExpression =>
  bounds[0] ?? objectType;

const isRawRoot = (type: TypeExpression): boolean =>
  type.kind === "named" &&
  type.entityId === ROOT_ENTITY_ID &&
  type.typeArguments.length === 0;

// ─────────────────────────────────────────────────────────────────────────
// isSubEntity - nominal ancestry, ignoring type arguments
// ─────────────────────────────────────────────────────────────────────────

export const isSubEntity = (
  lookup: EntityLookup,
  entityId: string,
  ancestorId: string
): boolean => {
  if (entityId === ancestorId || ancestorId === ROOT_ENTITY_ID) return true;
  return lookup
    .hierarchy(lookup.require(entityId))
    .some((e) => e.id === ancestorId);
};

// ─────────────────────────────────────────────────────────────────────────
// getTypeArguments - assignments of `type` as seen from an ancestor entity
// ─────────────────────────────────────────────────────────────────────────

/**
 * Assignments of the ancestor's placeholders (and every placeholder on the
 * way) for `type`, or undefined when `type` is not a descendant.
 */
export const getTypeArguments = (
  lookup: EntityLookup,
  type: TypeExpression,
  ancestorId: string
): SubstitutionMap | undefined => {
  switch (type.kind) {
    case "named":
      return isSubEntity(lookup, type.entityId, ancestorId)
        ? collectAssignments(lookup, type)
        : undefined;
    case "placeholder":
    case "wildcard":
      return getTypeArguments(lookup, firstUpperBound(type.upperBounds), ancestorId);
    case "arrayOf":
      return ancestorId === ROOT_ENTITY_ID ? new Map() : undefined;
  }
};

// ─────────────────────────────────────────────────────────────────────────
// isAssignable - generic-aware subtype check
// ─────────────────────────────────────────────────────────────────────────

/**
 * Whether a type argument `source` is contained by `target` (invariant
 * unless `target` is a wildcard or placeholder).
 */
const containsArgument = (
  lookup: EntityLookup,
  source: TypeExpression,
  target: TypeExpression
): boolean => {
  if (typesEqual(source, target)) return true;
  if (target.kind === "wildcard" || target.kind === "placeholder") {
    return isAssignable(lookup, source, target);
  }
  return false;
};

const isNamedAssignable = (
  lookup: EntityLookup,
  source: NamedType,
  target: NamedType
): boolean => {
  const map = getTypeArguments(lookup, source, target.entityId);
  if (map === undefined) return false;
  if (target.typeArguments.length === 0) return true;

  const targetEntity = lookup.require(target.entityId);
  return targetEntity.typeParameters.every((param, i) => {
    const targetArg = target.typeArguments[i];
    if (targetArg === undefined) return true;
    const sourceArg =
      source.entityId === target.entityId
        ? source.typeArguments[i]
        : unrollVariables(map, param);
    // Raw or unbound source arguments are accepted unchecked
    return sourceArg === undefined || containsArgument(lookup, sourceArg, targetArg);
  });
};

export const isAssignable = (
  lookup: EntityLookup,
  source: TypeExpression,
  target: TypeExpression
): boolean => {
  if (typesEqual(source, target)) return true;

  switch (target.kind) {
    case "wildcard":
      return (
        target.upperBounds.every((b) => isAssignable(lookup, source, b)) &&
        target.lowerBounds.every((b) => isAssignable(lookup, b, source))
      );
    case "placeholder":
      if (source.kind === "placeholder") {
        // A placeholder is assignable to another only through its bounds
        return source.upperBounds.some((b) => isAssignable(lookup, b, target));
      }
      return target.upperBounds.every((b) => isAssignable(lookup, source, b));
    default:
      break;
  }

  if (isRawRoot(target)) return true;

  switch (source.kind) {
    case "placeholder":
    case "wildcard":
      return source.upperBounds.some((b) => isAssignable(lookup, b, target));
    case "arrayOf":
      return (
        target.kind === "arrayOf" &&
        isAssignable(lookup, source.component, target.component)
      );
    case "named":
      return target.kind === "named" && isNamedAssignable(lookup, source, target);
  }
};

// ─────────────────────────────────────────────────────────────────────────
// isInstance - runtime value against a type
// ─────────────────────────────────────────────────────────────────────────

const PRIMITIVE_ENTITIES = new Set(["String", "Number", "Boolean"]);

/**
 * Whether `value` may be held by a position of type `type`.
 *
 * null/undefined are instances of every type except the primitive
 * entities. Type arguments cannot be checked against erased values; arrays
 * are checked element-wise against `arrayOf` types.
 */
export const isInstance = (
  catalog: Pick<EntityCatalog, "entityOf" | "get" | "require" | "hierarchy">,
  value: unknown,
  type: TypeExpression
): boolean => {
  if (value === null || value === undefined) {
    return !(type.kind === "named" && PRIMITIVE_ENTITIES.has(type.entityId));
  }

  switch (type.kind) {
    case "placeholder":
    case "wildcard":
      return type.upperBounds.every((b) => isInstance(catalog, value, b));
    case "arrayOf":
      return (
        Array.isArray(value) &&
        value.every((element: unknown) => isInstance(catalog, element, type.component))
      );
    case "named": {
      const entity = catalog.entityOf(value);
      return entity !== undefined && isSubEntity(catalog, entity.id, type.entityId);
    }
  }
};
