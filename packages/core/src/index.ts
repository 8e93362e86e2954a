/**
 * Generis Core - type expressions, entity catalog and generic signature resolver
 */

export * from "./types/type-expression.js";
export * from "./types/type-ops.js";
export * from "./types/result.js";
export * from "./types/diagnostic.js";

export * from "./catalog/types.js";
export { createEntityCatalog, TYPED_ENTITY_ID } from "./catalog/catalog.js";
export type { EntityCatalogOptions } from "./catalog/catalog.js";
export {
  loadEntityManifest,
  parseEntityManifest,
  RUNTIME_CONSTRUCTORS,
  STANDARD_MANIFEST_PATH,
} from "./catalog/manifest.js";
export { parseTypeText } from "./catalog/type-parser.js";
export type { TypeNameScope } from "./catalog/type-parser.js";

export {
  aliasChain,
  collectAssignments,
  followAssignments,
  inverseAliasChain,
  invertAssignments,
  unrollVariables,
} from "./resolver/assignments.js";
export type { InverseAliasMap } from "./resolver/assignments.js";
export { expandBindingTable, invokeBinding } from "./resolver/explicit-bindings.js";
export type { ExplicitBindingTable } from "./resolver/explicit-bindings.js";
export {
  getTypeArguments,
  isAssignable,
  isInstance,
  isSubEntity,
} from "./resolver/relations.js";
export { buildResolver } from "./resolver/resolver.js";
export type { Resolver } from "./resolver/resolver.js";
