/**
 * Substitution maps over entity hierarchies
 *
 * Pure functions: callers cache the results (see resolver.ts).
 */

import type { EntityLookup } from "../catalog/types.js";
import type {
  PlaceholderType,
  TypeExpression,
} from "../types/type-expression.js";
import type { Substitution, SubstitutionMap } from "../types/type-ops.js";
import {
  lookupSubstitution,
  mapPlaceholders,
  placeholderKey,
} from "../types/type-ops.js";

/**
 * Placeholder → placeholders that are substituted *by* it.
 *
 * If `Base.T ↦ Derived.U` is in the substitution map, the inverse map holds
 * `Derived.U ↦ [Base.T]`. Several ancestor placeholders may forward to the
 * same descendant placeholder.
 */
export type InverseAliasMap = ReadonlyMap<string, readonly PlaceholderType[]>;

/**
 * Collect the assignment of every ancestor placeholder reachable from `type`.
 *
 * Each interface is visited at most once, so an interface re-implemented at
 * several levels of a diamond contributes the assignments of its first visit.
 */
export const collectAssignments = (
  lookup: EntityLookup,
  type: TypeExpression | undefined
): SubstitutionMap => {
  const result = new Map<string, Substitution>();
  const seenInterfaces = new Set<string>();

  const spider = (current: TypeExpression | undefined): void => {
    if (current === undefined || current.kind !== "named") return;

    const entity = lookup.require(current.entityId);
    const args = current.typeArguments;
    if (args.length > 0) {
      entity.typeParameters.forEach((param, i) => {
        const arg = args[i];
        if (arg) {
          result.set(placeholderKey(param), { placeholder: param, type: arg });
        }
      });
    }

    if (entity.kind === "interface") {
      if (seenInterfaces.has(entity.id)) return;
      seenInterfaces.add(entity.id);
    }

    for (const iface of entity.interfaces) {
      spider(iface);
    }
    spider(entity.superclass);
  };

  spider(type);
  return result;
};

/**
 * Inverse of `map` restricted to entries whose value is a placeholder.
 */
export const invertAssignments = (map: SubstitutionMap): InverseAliasMap => {
  const result = new Map<string, PlaceholderType[]>();
  for (const { placeholder, type } of map.values()) {
    if (type.kind !== "placeholder") continue;
    const key = placeholderKey(type);
    const existing = result.get(key);
    if (existing) {
      existing.push(placeholder);
    } else {
      result.set(key, [placeholder]);
    }
  }
  return result;
};

/**
 * Every placeholder visited following `start` forward through `map`, in
 * order. Stops at the first non-placeholder value or on a repeat.
 */
export const aliasChain = (
  map: SubstitutionMap,
  start: PlaceholderType
): readonly PlaceholderType[] => {
  const chain: PlaceholderType[] = [];
  const seen = new Set<string>([placeholderKey(start)]);
  let next = lookupSubstitution(map, start);
  while (next !== undefined && next.kind === "placeholder") {
    const key = placeholderKey(next);
    if (seen.has(key)) break;
    seen.add(key);
    chain.push(next);
    next = lookupSubstitution(map, next);
  }
  return chain;
};

/**
 * Every placeholder that forwards (directly or transitively) to `start`,
 * breadth-first.
 */
export const inverseAliasChain = (
  inverse: InverseAliasMap,
  start: PlaceholderType
): readonly PlaceholderType[] => {
  const chain: PlaceholderType[] = [];
  const seen = new Set<string>([placeholderKey(start)]);
  const queue: PlaceholderType[] = [start];
  for (let current = queue.shift(); current; current = queue.shift()) {
    for (const alias of inverse.get(placeholderKey(current)) ?? []) {
      const key = placeholderKey(alias);
      if (seen.has(key)) continue;
      seen.add(key);
      chain.push(alias);
      queue.push(alias);
    }
  }
  return chain;
};

/**
 * Follow substitutions as far as they go. Unlike `unrollVariables`, an
 * unbound placeholder at the end of the chain is returned rather than
 * dropped, and nested placeholders are followed the same way.
 */
export const followAssignments = (
  map: SubstitutionMap,
  type: TypeExpression
): TypeExpression =>
  mapPlaceholders(type, (p) => {
    const chain = aliasChain(map, p);
    const last = chain[chain.length - 1] ?? p;
    const next = lookupSubstitution(map, last);
    if (next === undefined || next.kind === "placeholder") {
      return last;
    }
    return followAssignments(map, next);
  });

/**
 * Follow substitutions until a non-placeholder type is reached.
 *
 * A placeholder with no further substitution yields undefined. Placeholders
 * nested inside named types, wildcards or arrays are unrolled where
 * possible and kept as-is otherwise.
 */
export const unrollVariables = (
  map: SubstitutionMap,
  type: TypeExpression,
  expanding: ReadonlySet<string> = new Set()
): TypeExpression | undefined => {
  const keep = (inner: TypeExpression): TypeExpression =>
    unrollVariables(map, inner, expanding) ?? inner;

  switch (type.kind) {
    case "placeholder": {
      const key = placeholderKey(type);
      if (expanding.has(key)) return undefined;
      const next = lookupSubstitution(map, type);
      if (next === undefined) return undefined;
      return unrollVariables(map, next, new Set([...expanding, key]));
    }
    case "named":
      return type.typeArguments.length === 0
        ? type
        : { ...type, typeArguments: type.typeArguments.map(keep) };
    case "wildcard":
      return {
        ...type,
        upperBounds: type.upperBounds.map(keep),
        lowerBounds: type.lowerBounds.map(keep),
      };
    case "arrayOf":
      return { ...type, component: keep(type.component) };
  }
};
