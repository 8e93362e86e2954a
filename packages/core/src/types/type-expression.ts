/**
 * Type expression model
 *
 * A closed set of immutable variants describing a type as it is used by the
 * catalog, the resolver and the dispatch engine.
 */

export type TypeExpression =
  | NamedType
  | PlaceholderType
  | WildcardType
  | ArrayOfType;

/**
 * Concrete or raw generic type (e.g. `List<String>`, raw `List`).
 *
 * `typeArguments` is empty for non-generic entities and raw usage.
 */
export type NamedType = {
  readonly kind: "named";
  readonly entityId: string;
  readonly typeArguments: readonly TypeExpression[];
};

/**
 * Generic parameter as declared by some entity (or generic function).
 *
 * Identity is (name, declaringEntityId, declarationKind); bounds do not take
 * part in equality.
 */
export type PlaceholderType = {
  readonly kind: "placeholder";
  readonly name: string;
  readonly declaringEntityId: string;
  readonly declarationKind: PlaceholderDeclarationKind;
  readonly upperBounds: readonly TypeExpression[];
};

export type PlaceholderDeclarationKind = "entity" | "function";

/**
 * Bounded unknown type (`?`, `? extends T`, `? super T`)
 */
export type WildcardType = {
  readonly kind: "wildcard";
  readonly upperBounds: readonly TypeExpression[];
  readonly lowerBounds: readonly TypeExpression[];
};

export type ArrayOfType = {
  readonly kind: "arrayOf";
  readonly component: TypeExpression;
};

/** Id of the root entity every named type is assignable to */
export const ROOT_ENTITY_ID = "Object";

export const objectType: NamedType = {
  kind: "named",
  entityId: ROOT_ENTITY_ID,
  typeArguments: [],
};

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTORS
// ═══════════════════════════════════════════════════════════════════════════

export const named = (
  entityId: string,
  ...typeArguments: readonly TypeExpression[]
): NamedType => ({
  kind: "named",
  entityId,
  typeArguments,
});

export const placeholder = (
  name: string,
  declaringEntityId: string,
  upperBounds: readonly TypeExpression[] = []
): PlaceholderType => ({
  kind: "placeholder",
  name,
  declaringEntityId,
  declarationKind: "entity",
  upperBounds,
});

/**
 * Placeholder declared by a generic function rather than an entity.
 * The resolver refuses these.
 */
export const functionPlaceholder = (
  name: string,
  declaringFunction: string,
  upperBounds: readonly TypeExpression[] = []
): PlaceholderType => ({
  kind: "placeholder",
  name,
  declaringEntityId: declaringFunction,
  declarationKind: "function",
  upperBounds,
});

export const wildcard = (
  upperBounds: readonly TypeExpression[],
  lowerBounds: readonly TypeExpression[] = []
): WildcardType => ({
  kind: "wildcard",
  upperBounds,
  lowerBounds,
});

/** `?` */
export const wildcardAll: WildcardType = wildcard([objectType]);

/** `? extends bound` */
export const wildcardExtends = (bound: TypeExpression): WildcardType =>
  wildcard([bound]);

/** `? super bound` */
export const wildcardSuper = (bound: TypeExpression): WildcardType =>
  wildcard([objectType], [bound]);

export const arrayOf = (component: TypeExpression): ArrayOfType => ({
  kind: "arrayOf",
  component,
});

// ═══════════════════════════════════════════════════════════════════════════
// GUARDS
// ═══════════════════════════════════════════════════════════════════════════

export const isNamed = (type: TypeExpression): type is NamedType =>
  type.kind === "named";

export const isPlaceholder = (type: TypeExpression): type is PlaceholderType =>
  type.kind === "placeholder";

export const isWildcard = (type: TypeExpression): type is WildcardType =>
  type.kind === "wildcard";

export const isArrayOf = (type: TypeExpression): type is ArrayOfType =>
  type.kind === "arrayOf";

/**
 * Runtime check that an unknown value is a TypeExpression.
 * Used where type expressions cross an untyped boundary (binding accessors).
 */
export const isTypeExpression = (value: unknown): value is TypeExpression => {
  if (typeof value !== "object" || value === null) return false;
  const kind: unknown = Reflect.get(value, "kind");
  return (
    kind === "named" ||
    kind === "placeholder" ||
    kind === "wildcard" ||
    kind === "arrayOf"
  );
};
