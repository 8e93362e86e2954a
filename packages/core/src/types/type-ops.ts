import type {
  PlaceholderType,
  TypeExpression,
  WildcardType,
} from "./type-expression.js";
import { ROOT_ENTITY_ID } from "./type-expression.js";

/**
 * Assignment of one placeholder to a type, as recorded in a SubstitutionMap.
 */
export type Substitution = {
  readonly placeholder: PlaceholderType;
  readonly type: TypeExpression;
};

/**
 * Placeholder → type, keyed by `placeholderKey`.
 */
export type SubstitutionMap = ReadonlyMap<string, Substitution>;

export const placeholderKey = (p: PlaceholderType): string =>
  `${p.declarationKind === "function" ? "fn" : "tp"}:${p.declaringEntityId}.${p.name}`;

export const lookupSubstitution = (
  map: SubstitutionMap,
  p: PlaceholderType
): TypeExpression | undefined => map.get(placeholderKey(p))?.type;

const isRootBound = (bounds: readonly TypeExpression[]): boolean => {
  if (bounds.length === 0) return true;
  const [first] = bounds;
  return (
    bounds.length === 1 &&
    first !== undefined &&
    first.kind === "named" &&
    first.entityId === ROOT_ENTITY_ID &&
    first.typeArguments.length === 0
  );
};

/**
 * Canonical string key; equal keys ⇔ structurally equal expressions.
 */
export const stableTypeKey = (type: TypeExpression): string => {
  switch (type.kind) {
    case "named":
      return type.typeArguments.length === 0
        ? `n:${type.entityId}`
        : `n:${type.entityId}<${type.typeArguments.map(stableTypeKey).join(",")}>`;
    case "placeholder":
      return placeholderKey(type);
    case "wildcard":
      return `w:[${type.upperBounds.map(stableTypeKey).join("&")}]:[${type.lowerBounds.map(stableTypeKey).join("&")}]`;
    case "arrayOf":
      return `a:${stableTypeKey(type.component)}`;
  }
};

export const typesEqual = (a: TypeExpression, b: TypeExpression): boolean => {
  if (a === b) return true;
  if (a.kind !== b.kind) return false;
  return stableTypeKey(a) === stableTypeKey(b);
};

const formatWildcard = (w: WildcardType): string => {
  if (w.lowerBounds.length > 0) {
    return `? super ${w.lowerBounds.map(formatType).join(" & ")}`;
  }
  if (!isRootBound(w.upperBounds)) {
    return `? extends ${w.upperBounds.map(formatType).join(" & ")}`;
  }
  return "?";
};

/**
 * Human-readable rendering, e.g. `Map<String, List<? extends Number>>`.
 */
export const formatType = (type: TypeExpression): string => {
  switch (type.kind) {
    case "named":
      return type.typeArguments.length === 0
        ? type.entityId
        : `${type.entityId}<${type.typeArguments.map(formatType).join(", ")}>`;
    case "placeholder":
      return type.name;
    case "wildcard":
      return formatWildcard(type);
    case "arrayOf":
      return `${formatType(type.component)}[]`;
  }
};

/**
 * Placeholder with its bounds, e.g. `T extends Comparable<T>`.
 */
export const formatPlaceholderDeclaration = (p: PlaceholderType): string =>
  isRootBound(p.upperBounds)
    ? p.name
    : `${p.name} extends ${p.upperBounds.map(formatType).join(" & ")}`;

export const containsPlaceholder = (type: TypeExpression): boolean => {
  switch (type.kind) {
    case "placeholder":
      return true;
    case "named":
      return type.typeArguments.some(containsPlaceholder);
    case "wildcard":
      return (
        type.upperBounds.some(containsPlaceholder) ||
        type.lowerBounds.some(containsPlaceholder)
      );
    case "arrayOf":
      return containsPlaceholder(type.component);
  }
};

/**
 * Replace placeholders using `replace`; placeholders it leaves undefined stay.
 */
export const mapPlaceholders = (
  type: TypeExpression,
  replace: (p: PlaceholderType) => TypeExpression | undefined
): TypeExpression => {
  switch (type.kind) {
    case "placeholder":
      return replace(type) ?? type;
    case "named":
      return type.typeArguments.length === 0
        ? type
        : {
            ...type,
            typeArguments: type.typeArguments.map((arg) =>
              mapPlaceholders(arg, replace)
            ),
          };
    case "wildcard":
      return {
        ...type,
        upperBounds: type.upperBounds.map((b) => mapPlaceholders(b, replace)),
        lowerBounds: type.lowerBounds.map((b) => mapPlaceholders(b, replace)),
      };
    case "arrayOf":
      return { ...type, component: mapPlaceholders(type.component, replace) };
  }
};

/**
 * Apply a substitution map one level deep (no chain following).
 */
export const substitute = (
  type: TypeExpression,
  map: SubstitutionMap
): TypeExpression => mapPlaceholders(type, (p) => lookupSubstitution(map, p));
