/**
 * Generic signature resolver
 *
 * Resolves a placeholder declared somewhere in an instance's hierarchy to
 * the type bound to it for that instance. Explicit bindings are consulted
 * first; structural substitution is the fallback.
 *
 * Substitution maps and binding tables are computed once per entity and
 * shared by every instance of it.
 */

import type {
  EntityCatalog,
  EntityDescriptor,
  ExplicitBinding,
} from "../catalog/types.js";
import { fail } from "../types/diagnostic.js";
import type {
  NamedType,
  PlaceholderType,
  TypeExpression,
} from "../types/type-expression.js";
import { named, objectType } from "../types/type-expression.js";
import type { SubstitutionMap } from "../types/type-ops.js";
import {
  containsPlaceholder,
  formatType,
  placeholderKey,
  stableTypeKey,
  typesEqual,
} from "../types/type-ops.js";
import type { InverseAliasMap } from "./assignments.js";
import {
  collectAssignments,
  followAssignments,
  invertAssignments,
  unrollVariables,
} from "./assignments.js";
import type { ExplicitBindingTable } from "./explicit-bindings.js";
import { expandBindingTable, invokeBinding } from "./explicit-bindings.js";
import {
  getTypeArguments,
  isAssignable,
  isInstance,
  isSubEntity,
} from "./relations.js";

export type Resolver = {
  readonly catalog: EntityCatalog;
  /**
   * Type bound to `placeholder` for `instance`, or undefined when nothing
   * binds it. Throws GEN2001/GEN2002 on misuse.
   */
  readonly resolve: (
    instance: unknown,
    placeholder: PlaceholderType,
    substitutionMap?: SubstitutionMap
  ) => TypeExpression | undefined;
  /**
   * Placeholder or wildcard → first upper bound, after trying the
   * assignments `contextType` makes.
   */
  readonly refine: (
    type: TypeExpression,
    contextType?: TypeExpression
  ) => TypeExpression;
  readonly narrowestParameterizedType: (
    concreteEntity: EntityDescriptor | string | undefined,
    parameterizedAncestorType: NamedType
  ) => NamedType;
  readonly typeArguments: (
    type: TypeExpression,
    ancestorEntityId: string
  ) => SubstitutionMap | undefined;
  /** Assignments made by an entity's hierarchy, or by a (parameterized) type */
  readonly substitutionMap: (
    target: EntityDescriptor | TypeExpression
  ) => SubstitutionMap;
  readonly inverseAliases: (map: SubstitutionMap) => InverseAliasMap;
  readonly unroll: (
    map: SubstitutionMap,
    type: TypeExpression
  ) => TypeExpression | undefined;
  readonly isAssignable: (source: TypeExpression, target: TypeExpression) => boolean;
  readonly isInstance: (value: unknown, type: TypeExpression) => boolean;
  /** Expanded explicit-binding table of a runtime entity */
  readonly explicitBindings: (entity: EntityDescriptor) => ExplicitBindingTable;
};

const MAX_REFINE_STEPS = 32;

export const buildResolver = (catalog: EntityCatalog): Resolver => {
  const entityMaps = new Map<string, SubstitutionMap>();
  const typeMaps = new Map<string, SubstitutionMap>();
  const inverseMaps = new WeakMap<SubstitutionMap, InverseAliasMap>();
  const bindingTables = new Map<string, ExplicitBindingTable>();

  const inverseAliases = (map: SubstitutionMap): InverseAliasMap => {
    const cached = inverseMaps.get(map);
    if (cached) return cached;
    const inverse = invertAssignments(map);
    inverseMaps.set(map, inverse);
    return inverse;
  };

  const entityMap = (entity: EntityDescriptor): SubstitutionMap => {
    const cached = entityMaps.get(entity.id);
    if (cached) return cached;
    const map = collectAssignments(catalog, named(entity.id));
    entityMaps.set(entity.id, map);
    return map;
  };

  const substitutionMap = (
    target: EntityDescriptor | TypeExpression
  ): SubstitutionMap => {
    if (target.kind === "class" || target.kind === "interface") {
      return entityMap(target);
    }
    const key = stableTypeKey(target);
    const cached = typeMaps.get(key);
    if (cached) return cached;
    const map = collectAssignments(catalog, target);
    typeMaps.set(key, map);
    return map;
  };

  const explicitBindings = (entity: EntityDescriptor): ExplicitBindingTable => {
    const cached = bindingTables.get(entity.id);
    if (cached) return cached;
    const map = entityMap(entity);
    const table = expandBindingTable(catalog, entity, map, inverseAliases(map));
    bindingTables.set(entity.id, table);
    return table;
  };

  const resolve = (
    instance: unknown,
    p: PlaceholderType,
    supplied?: SubstitutionMap
  ): TypeExpression | undefined => {
    if (p.declarationKind !== "entity") {
      return fail(
        "GEN2001",
        `Placeholder '${p.name}' is declared by '${p.declaringEntityId}', not by an entity`,
        "Only entity type parameters can be resolved against an instance"
      );
    }

    const entity = catalog.entityOf(instance);
    if (!entity || !isSubEntity(catalog, entity.id, p.declaringEntityId)) {
      return fail(
        "GEN2002",
        `Placeholder '${p.declaringEntityId}.${p.name}' is not declared in the hierarchy of '${entity?.id ?? String(instance)}'`
      );
    }

    const binding: ExplicitBinding | undefined = explicitBindings(entity).get(
      placeholderKey(p)
    );
    if (binding && typeof instance === "object" && instance !== null) {
      return invokeBinding(binding, instance);
    }

    return unrollVariables(supplied ?? entityMap(entity), p);
  };

  const refine = (type: TypeExpression, contextType?: TypeExpression): TypeExpression => {
    let current = type;
    if (contextType !== undefined && containsPlaceholder(current)) {
      current = unrollVariables(substitutionMap(contextType), current) ?? current;
    }
    for (let step = 0; step < MAX_REFINE_STEPS; step++) {
      if (current.kind !== "placeholder" && current.kind !== "wildcard") {
        return current;
      }
      current = current.upperBounds[0] ?? objectType;
    }
    return objectType;
  };

  /**
   * Bind `pattern` (written in `owner`'s placeholders) to `actual`, recording
   * owner placeholders in `bindings`. False on a mismatch.
   */
  const unify = (
    owner: EntityDescriptor,
    pattern: TypeExpression,
    actual: TypeExpression,
    bindings: Map<string, TypeExpression>
  ): boolean => {
    if (pattern.kind === "placeholder") {
      if (pattern.declaringEntityId !== owner.id) return false;
      const key = placeholderKey(pattern);
      const existing = bindings.get(key);
      if (existing) return typesEqual(existing, actual);
      bindings.set(key, actual);
      return true;
    }
    if (!containsPlaceholder(pattern)) {
      // Type arguments are invariant unless the ancestor's is a wildcard
      return (
        typesEqual(pattern, actual) ||
        (actual.kind === "wildcard" && isAssignable(catalog, pattern, actual))
      );
    }
    if (pattern.kind === "named" && actual.kind === "named") {
      return (
        pattern.entityId === actual.entityId &&
        pattern.typeArguments.length === actual.typeArguments.length &&
        pattern.typeArguments.every((arg, i) => {
          const other = actual.typeArguments[i];
          return other !== undefined && unify(owner, arg, other, bindings);
        })
      );
    }
    if (pattern.kind === "arrayOf" && actual.kind === "arrayOf") {
      return unify(owner, pattern.component, actual.component, bindings);
    }
    return false;
  };

  const parameterizeAs = (
    candidate: EntityDescriptor,
    ancestor: NamedType
  ): NamedType | undefined => {
    const ancestorEntity = catalog.require(ancestor.entityId);
    const map = entityMap(candidate);
    const bindings = new Map<string, TypeExpression>();

    const consistent = ancestorEntity.typeParameters.every((param, i) => {
      const actual = ancestor.typeArguments[i];
      if (actual === undefined) return false;
      const pattern =
        candidate.id === ancestorEntity.id ? param : followAssignments(map, param);
      return unify(candidate, pattern, actual, bindings);
    });
    if (!consistent) return undefined;

    const args: TypeExpression[] = [];
    for (const own of candidate.typeParameters) {
      const bound = bindings.get(placeholderKey(own));
      if (bound === undefined) return undefined;
      args.push(bound);
    }
    return named(candidate.id, ...args);
  };

  const narrowestParameterizedType = (
    concreteEntity: EntityDescriptor | string | undefined,
    ancestor: NamedType
  ): NamedType => {
    if (concreteEntity === undefined) return ancestor;
    const concrete =
      typeof concreteEntity === "string"
        ? catalog.require(concreteEntity)
        : concreteEntity;

    if (!isSubEntity(catalog, concrete.id, ancestor.entityId)) {
      return fail(
        "GEN2003",
        `'${concrete.id}' is not a descendant of ${formatType(ancestor)}`
      );
    }
    if (ancestor.typeArguments.length === 0) {
      return named(concrete.id);
    }

    for (const candidate of catalog.hierarchy(concrete)) {
      if (!isSubEntity(catalog, candidate.id, ancestor.entityId)) continue;
      const parameterized = parameterizeAs(candidate, ancestor);
      if (parameterized) return parameterized;
    }
    return ancestor;
  };

  return {
    catalog,
    resolve,
    refine,
    narrowestParameterizedType,
    typeArguments: (type, ancestorEntityId) =>
      getTypeArguments(catalog, type, ancestorEntityId),
    substitutionMap,
    inverseAliases,
    unroll: (map, type) => unrollVariables(map, type),
    isAssignable: (source, target) => isAssignable(catalog, source, target),
    isInstance: (value, type) => isInstance(catalog, value, type),
    explicitBindings,
  };
};
