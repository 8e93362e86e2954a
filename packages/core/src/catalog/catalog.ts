/**
 * Entity catalog
 *
 * Declarations are parsed and validated once, eagerly; hierarchies are
 * computed on first use and cached per entity. Entities can only refer to
 * entities declared before them, so a cached hierarchy never changes.
 */

import { collectAssignments, followAssignments } from "../resolver/assignments.js";
import { fail, GenerisError } from "../types/diagnostic.js";
import type {
  NamedType,
  PlaceholderType,
  TypeExpression,
} from "../types/type-expression.js";
import {
  named,
  objectType,
  placeholder,
  ROOT_ENTITY_ID,
} from "../types/type-expression.js";
import { formatType, placeholderKey } from "../types/type-ops.js";
import { loadEntityManifest, STANDARD_MANIFEST_PATH } from "./manifest.js";
import type { TypeNameScope } from "./type-parser.js";
import { parseTypeText } from "./type-parser.js";
import type {
  BindingDeclaration,
  EntityCatalog,
  EntityDeclaration,
  EntityDescriptor,
  EntityLookup,
  ExplicitBinding,
  RuntimeConstructor,
  TypeParameterDeclaration,
} from "./types.js";

/** Entity whose single placeholder explicit-binding accessors must bind */
export const TYPED_ENTITY_ID = "Typed";

export type EntityCatalogOptions = {
  /** Load the standard entity manifest first (default true) */
  readonly standard?: boolean;
  /** Additional declarations defined after the standard ones */
  readonly declarations?: readonly EntityDeclaration[];
};

const parameterName = (param: TypeParameterDeclaration): string =>
  typeof param === "string" ? param : param.name;

const parameterBounds = (
  param: TypeParameterDeclaration
): readonly string[] => (typeof param === "string" ? [] : (param.bounds ?? []));

export const createEntityCatalog = (
  options: EntityCatalogOptions = {}
): EntityCatalog => {
  const entities = new Map<string, EntityDescriptor>();
  const runtimeIndex = new Map<unknown, EntityDescriptor>();
  const hierarchyCache = new Map<string, readonly EntityDescriptor[]>();

  const get = (id: string): EntityDescriptor | undefined => entities.get(id);

  const require = (id: string): EntityDescriptor => {
    const entity = entities.get(id);
    if (!entity) {
      return fail(
        "GEN1004",
        `Unknown entity '${id}'`,
        "Declare the entity in the catalog before referring to it"
      );
    }
    return entity;
  };

  const hierarchy = (entity: EntityDescriptor): readonly EntityDescriptor[] => {
    const cached = hierarchyCache.get(entity.id);
    if (cached) return cached;

    const result: EntityDescriptor[] = [];
    const seenInterfaces = new Set<string>();

    const walkInterfaces = (current: EntityDescriptor): void => {
      for (const iface of current.interfaces) {
        if (seenInterfaces.has(iface.entityId)) continue;
        seenInterfaces.add(iface.entityId);
        const ifaceEntity = require(iface.entityId);
        result.push(ifaceEntity);
        walkInterfaces(ifaceEntity);
      }
    };

    let current: EntityDescriptor | undefined = entity;
    while (current) {
      result.push(current);
      walkInterfaces(current);
      current = current.superclass ? require(current.superclass.entityId) : undefined;
    }

    hierarchyCache.set(entity.id, result);
    return result;
  };

  const lookup: EntityLookup = { get, require, hierarchy };

  const scopeFor = (
    params: readonly PlaceholderType[]
  ): TypeNameScope => ({
    placeholder: (name) => params.find((p) => p.name === name),
    arity: (entityId) => entities.get(entityId)?.typeParameters.length,
  });

  const parse = (text: string, scopeEntityId?: string): TypeExpression => {
    const params =
      scopeEntityId === undefined ? [] : require(scopeEntityId).typeParameters;
    return parseTypeText(text, scopeFor(params));
  };

  const param = (entityId: string, name: string): PlaceholderType => {
    const found = require(entityId).typeParameters.find((p) => p.name === name);
    if (!found) {
      return fail(
        "GEN1005",
        `Entity '${entityId}' declares no type parameter '${name}'`
      );
    }
    return found;
  };

  const parseHeritage = (
    text: string,
    scope: TypeNameScope,
    expectedKind: "class" | "interface",
    owner: string
  ): NamedType => {
    const type = parseTypeText(text, scope);
    if (type.kind !== "named") {
      return fail(
        "GEN1005",
        `Entity '${owner}' cannot inherit from '${text}': not a named type`
      );
    }
    const target = require(type.entityId);
    if (target.kind !== expectedKind) {
      return fail(
        "GEN1005",
        `Entity '${owner}' cannot ${expectedKind === "class" ? "extend" : "implement"} ${target.kind} '${target.id}'`
      );
    }
    return type;
  };

  /**
   * Validate one explicit-binding accessor: a no-argument method whose
   * declared return type binds Typed's placeholder to one of the owner's.
   */
  const validateBinding = (
    owner: string,
    declaration: BindingDeclaration,
    scope: TypeNameScope,
    runtime: RuntimeConstructor | undefined
  ): ExplicitBinding => {
    const where = `Explicit binding '${owner}.${declaration.accessor}()'`;
    const returns = parseTypeText(declaration.returns, scope);

    const typedParam = require(TYPED_ENTITY_ID).typeParameters[0];
    const returnsTyped =
      returns.kind === "named" &&
      typedParam !== undefined &&
      hierarchy(require(returns.entityId)).some((e) => e.id === TYPED_ENTITY_ID);
    if (!returnsTyped || typedParam === undefined) {
      return fail(
        "GEN1001",
        `${where} must return ${TYPED_ENTITY_ID}<T>, found ${formatType(returns)}`
      );
    }

    const bound = followAssignments(collectAssignments(lookup, returns), typedParam);
    const boundOwn =
      bound.kind === "placeholder" &&
      bound.declarationKind === "entity" &&
      bound.declaringEntityId === owner
        ? bound
        : undefined;
    if (!boundOwn) {
      return fail(
        "GEN1001",
        `${where} should bind a type parameter of '${owner}' to ${TYPED_ENTITY_ID}<T>`,
        `Declared return type ${formatType(returns)} binds ${formatType(bound)}`
      );
    }

    if (runtime) {
      const proto: unknown = Reflect.get(runtime, "prototype");
      const method: unknown =
        typeof proto === "object" && proto !== null
          ? Reflect.get(proto, declaration.accessor)
          : undefined;
      if (typeof method !== "function") {
        return fail("GEN1001", `${where} is not a method of its runtime class`);
      }
      if (method.length !== 0) {
        return fail("GEN1001", `${where} must accept 0 parameters`);
      }
    }

    return {
      entityId: owner,
      placeholder: boundOwn,
      accessor: declaration.accessor,
      returns,
    };
  };

  const define = (declaration: EntityDeclaration): EntityDescriptor => {
    const { id } = declaration;
    const kind = declaration.kind ?? "class";

    if (id.length === 0) {
      return fail("GEN1005", "Entity id must not be empty");
    }
    if (entities.has(id)) {
      return fail("GEN1005", `Entity '${id}' is already declared`);
    }
    if (kind === "interface" && declaration.extends !== undefined) {
      return fail(
        "GEN1005",
        `Interface '${id}' cannot extend a class`,
        "List super-interfaces under 'implements'"
      );
    }

    const names = (declaration.typeParameters ?? []).map(parameterName);
    const duplicate = names.find((n, i) => names.indexOf(n) !== i);
    if (duplicate !== undefined) {
      return fail(
        "GEN1005",
        `Entity '${id}' declares type parameter '${duplicate}' twice`
      );
    }

    // Bounds may mention the entity's own parameters; parse them against the
    // bare placeholders (bounds take no part in placeholder identity).
    const bare = names.map((n) => placeholder(n, id));
    const bareScope = scopeFor(bare);
    const typeParameters = (declaration.typeParameters ?? []).map((p) => {
      const bounds = parameterBounds(p).map((b) => parseTypeText(b, bareScope));
      return placeholder(
        parameterName(p),
        id,
        bounds.length > 0 ? bounds : [objectType]
      );
    });
    const scope = scopeFor(typeParameters);

    const superclass =
      declaration.extends !== undefined
        ? parseHeritage(declaration.extends, scope, "class", id)
        : kind === "class" && id !== ROOT_ENTITY_ID
          ? objectType
          : undefined;

    const interfaces = (declaration.implements ?? []).map((text) =>
      parseHeritage(text, scope, "interface", id)
    );

    const runtime = declaration.runtime;
    if (runtime && runtimeIndex.has(runtime)) {
      return fail(
        "GEN1005",
        `Runtime constructor of '${id}' is already linked to '${runtimeIndex.get(runtime)?.id ?? "?"}'`
      );
    }

    // Register before validating bindings: a binding's return type may refer
    // to the entity being declared.
    const provisional: EntityDescriptor = {
      id,
      kind,
      typeParameters,
      superclass,
      interfaces,
      runtime,
      bindings: [],
      dependsOn: declaration.dependsOn ?? [],
    };
    entities.set(id, provisional);

    let bindings: readonly ExplicitBinding[];
    try {
      bindings = (declaration.bindings ?? []).map((b) =>
        validateBinding(id, b, scope, runtime)
      );
      const seen = new Set<string>();
      for (const binding of bindings) {
        const key = placeholderKey(binding.placeholder);
        if (seen.has(key)) {
          fail(
            "GEN1001",
            `Entity '${id}' declares more than one explicit binding for '${binding.placeholder.name}'`
          );
        }
        seen.add(key);
      }
    } catch (err) {
      entities.delete(id);
      hierarchyCache.delete(id);
      throw err;
    }

    const descriptor: EntityDescriptor = { ...provisional, bindings };
    entities.set(id, descriptor);
    hierarchyCache.delete(id);
    if (runtime) {
      runtimeIndex.set(runtime, descriptor);
    }
    return descriptor;
  };

  const defineAll = (
    declarations: readonly EntityDeclaration[]
  ): readonly EntityDescriptor[] => declarations.map(define);

  const entityOf = (value: unknown): EntityDescriptor | undefined => {
    if (value === null || value === undefined) return undefined;
    switch (typeof value) {
      case "string":
        return get("String") ?? get(ROOT_ENTITY_ID);
      case "number":
        return get("Number") ?? get(ROOT_ENTITY_ID);
      case "boolean":
        return get("Boolean") ?? get(ROOT_ENTITY_ID);
      case "object":
      case "function": {
        let proto: unknown = Object.getPrototypeOf(value);
        while (typeof proto === "object" && proto !== null) {
          const ctor: unknown = Object.prototype.hasOwnProperty.call(proto, "constructor")
            ? Reflect.get(proto, "constructor")
            : undefined;
          const entity = runtimeIndex.get(ctor);
          if (entity) return entity;
          proto = Object.getPrototypeOf(proto);
        }
        return get(ROOT_ENTITY_ID);
      }
      default:
        return get(ROOT_ENTITY_ID);
    }
  };

  const typeOf = (value: unknown): NamedType => {
    const entity = entityOf(value);
    return entity ? named(entity.id) : objectType;
  };

  const catalog: EntityCatalog = {
    get,
    require,
    hierarchy,
    define,
    defineAll,
    has: (id) => entities.has(id),
    all: () => [...entities.values()],
    param,
    parse,
    entityOf,
    typeOf,
  };

  if (options.standard ?? true) {
    const manifest = loadEntityManifest(STANDARD_MANIFEST_PATH);
    if (!manifest.ok) {
      throw new GenerisError(manifest.error);
    }
    defineAll(manifest.value);
  }
  if (options.declarations) {
    defineAll(options.declarations);
  }

  return catalog;
};
