/**
 * Entity Catalog Type Definitions
 *
 * An entity is a class- or interface-like declaration that may declare
 * placeholders and extend/implement other entities. TypeScript erases
 * generics, so the hierarchy a reflective host would provide is declared
 * once per entity and kept here.
 *
 * Key Types:
 * - EntityDeclaration: what callers (and the standard manifest) write
 * - EntityDescriptor: the validated, parsed, immutable form
 * - ExplicitBinding: per-instance override for one placeholder
 * - EntityCatalog: the single source of truth for entity lookups
 */

import type {
  NamedType,
  PlaceholderType,
  TypeExpression,
} from "../types/type-expression.js";

// ═══════════════════════════════════════════════════════════════════════════
// DECLARATIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Any constructor; instances (and instances of undeclared subclasses) are
 * linked to the entity that names it.
 */
export type RuntimeConstructor = abstract new (...args: never[]) => unknown;

export type EntityKind = "class" | "interface";

/**
 * `"T"` or `{ name: "T", bounds: ["Comparable<T>"] }`
 */
export type TypeParameterDeclaration =
  | string
  | { readonly name: string; readonly bounds?: readonly string[] };

/**
 * Explicit-binding accessor: a no-argument method on the runtime prototype
 * whose declared return type carries `Typed<P>` for a placeholder P of the
 * declaring entity.
 */
export type BindingDeclaration = {
  /** Method name on the runtime prototype */
  readonly accessor: string;
  /** Declared return type text, e.g. "Position.Readable<TARGET>" */
  readonly returns: string;
};

export type EntityDeclaration = {
  readonly id: string;
  /** Defaults to "class" */
  readonly kind?: EntityKind;
  readonly typeParameters?: readonly TypeParameterDeclaration[];
  /** Superclass type text (classes only); defaults to Object */
  readonly extends?: string;
  /** Implemented interfaces, or super-interfaces for an interface */
  readonly implements?: readonly string[];
  readonly runtime?: RuntimeConstructor;
  readonly bindings?: readonly BindingDeclaration[];
  /** Operator entities that must be consulted before this one */
  readonly dependsOn?: readonly string[];
};

// ═══════════════════════════════════════════════════════════════════════════
// DESCRIPTORS
// ═══════════════════════════════════════════════════════════════════════════

export type ExplicitBinding = {
  readonly entityId: string;
  readonly placeholder: PlaceholderType;
  readonly accessor: string;
  readonly returns: TypeExpression;
};

export type EntityDescriptor = {
  readonly id: string;
  readonly kind: EntityKind;
  readonly typeParameters: readonly PlaceholderType[];
  /** Undefined only for the root entity and for interfaces */
  readonly superclass?: NamedType;
  readonly interfaces: readonly NamedType[];
  readonly runtime?: RuntimeConstructor;
  readonly bindings: readonly ExplicitBinding[];
  readonly dependsOn: readonly string[];
};

// ═══════════════════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Read-only lookups used by the resolver and relations.
 */
export type EntityLookup = {
  readonly get: (id: string) => EntityDescriptor | undefined;
  /** Throws GEN1004 for unknown ids */
  readonly require: (id: string) => EntityDescriptor;
  /**
   * The entity itself, its interfaces (depth-first), then its superclass and
   * that superclass's unseen interfaces. Each entity appears once.
   */
  readonly hierarchy: (entity: EntityDescriptor) => readonly EntityDescriptor[];
};

export type EntityCatalog = EntityLookup & {
  /** Declare one entity; throws GEN1004/GEN1005/GEN1001 on invalid input */
  readonly define: (declaration: EntityDeclaration) => EntityDescriptor;
  /** Declare several entities in order */
  readonly defineAll: (
    declarations: readonly EntityDeclaration[]
  ) => readonly EntityDescriptor[];
  readonly has: (id: string) => boolean;
  readonly all: () => readonly EntityDescriptor[];
  /** A declared placeholder of an entity; throws GEN1005 if absent */
  readonly param: (entityId: string, name: string) => PlaceholderType;
  /** Parse a type text, resolving placeholders against `scopeEntityId` */
  readonly parse: (text: string, scopeEntityId?: string) => TypeExpression;
  /** Entity of a runtime value; undefined for null/undefined */
  readonly entityOf: (value: unknown) => EntityDescriptor | undefined;
  /** Raw named type of a runtime value's entity */
  readonly typeOf: (value: unknown) => NamedType;
};
