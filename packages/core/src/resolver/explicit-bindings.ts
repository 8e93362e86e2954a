/**
 * Explicit-binding tables
 *
 * An entity's declared bindings only name the placeholder they were written
 * against. For a runtime entity the table is expanded so that every
 * placeholder forwarding to (or forwarded from) a bound placeholder shares
 * its binding. The first entity in hierarchy order wins.
 */

import type {
  EntityDescriptor,
  EntityLookup,
  ExplicitBinding,
} from "../catalog/types.js";
import { fail } from "../types/diagnostic.js";
import type { TypeExpression } from "../types/type-expression.js";
import { isTypeExpression } from "../types/type-expression.js";
import type { SubstitutionMap } from "../types/type-ops.js";
import { placeholderKey } from "../types/type-ops.js";
import type { InverseAliasMap } from "./assignments.js";
import { aliasChain, inverseAliasChain } from "./assignments.js";

/**
 * placeholderKey → binding that supplies it
 */
export type ExplicitBindingTable = ReadonlyMap<string, ExplicitBinding>;

export const expandBindingTable = (
  lookup: EntityLookup,
  entity: EntityDescriptor,
  assignments: SubstitutionMap,
  inverse: InverseAliasMap
): ExplicitBindingTable => {
  const table = new Map<string, ExplicitBinding>();
  const claim = (key: string, binding: ExplicitBinding): void => {
    if (!table.has(key)) table.set(key, binding);
  };

  for (const current of lookup.hierarchy(entity)) {
    for (const binding of current.bindings) {
      claim(placeholderKey(binding.placeholder), binding);
      for (const alias of aliasChain(assignments, binding.placeholder)) {
        claim(placeholderKey(alias), binding);
      }
      for (const alias of inverseAliasChain(inverse, binding.placeholder)) {
        claim(placeholderKey(alias), binding);
      }
    }
  }
  return table;
};

/**
 * Call a binding's accessor on `instance` and read the type it carries.
 */
export const invokeBinding = (
  binding: ExplicitBinding,
  instance: object
): TypeExpression => {
  const where = `Explicit binding '${binding.entityId}.${binding.accessor}()'`;
  const method: unknown = Reflect.get(instance, binding.accessor);
  if (typeof method !== "function") {
    return fail("GEN1001", `${where} is not a method of the instance`);
  }

  const typed: unknown = Reflect.apply(method, instance, []);
  if (typeof typed !== "object" || typed === null) {
    return fail(
      "GEN1001",
      `${where} returned ${typed === null ? "null" : typeof typed}`,
      "Binding accessors must return an object with getType()"
    );
  }

  const getType: unknown = Reflect.get(typed, "getType");
  const type: unknown =
    typeof getType === "function" ? Reflect.apply(getType, typed, []) : undefined;
  if (!isTypeExpression(type)) {
    return fail(
      "GEN1001",
      `${where} returned a value whose getType() is not a type expression`
    );
  }
  return type;
};
