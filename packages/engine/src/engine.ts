/**
 * Dispatch engine assembly
 *
 * Assembly defines the engine and module entities, computes every
 * operator's signature and freezes the precedence order. Evaluation goes
 * through contexts; the shortcuts below use a fresh context per call.
 */

import type {
  Diagnostic,
  EntityCatalog,
  EntityDeclaration,
  Resolver,
  Result,
} from "@generis/core";
import { buildResolver, createEntityCatalog } from "@generis/core";
import type { GenerisConfig, ResolvedConfig } from "./config.js";
import { resolveConfig } from "./config.js";
import type { DispatchContext } from "./context.js";
import { createDispatchContext } from "./context.js";
import { ENGINE_ENTITIES } from "./entities.js";
import type { Logger } from "./logging.js";
import { createLogger } from "./logging.js";
import type { OperatorSignature } from "./matching.js";
import { operatorSignature } from "./matching.js";
import type { OperatorModule } from "./module.js";
import type { Operation } from "./operation.js";
import type { AnyOperator } from "./operator.js";
import { orderByPrecedence } from "./precedence.js";

export type DispatchEngineOptions = {
  readonly modules: readonly OperatorModule[];
  /** Catalog to extend; a standard catalog is created when omitted */
  readonly catalog?: EntityCatalog;
  readonly config?: GenerisConfig;
  readonly logger?: Logger;
};

export type DispatchEngine = {
  readonly catalog: EntityCatalog;
  readonly resolver: Resolver;
  readonly config: ResolvedConfig;
  readonly logger: Logger;
  /** Operators in dispatch order */
  readonly operators: readonly AnyOperator[];
  readonly signatures: readonly OperatorSignature[];
  readonly createContext: () => DispatchContext;
  readonly eval: <R>(operation: Operation<R>) => R;
  readonly evalSuccess: (operation: Operation<unknown>) => boolean;
  readonly evaluate: <R>(operation: Operation<R>) => Result<R, Diagnostic>;
  readonly supports: (operation: Operation<unknown>) => boolean;
};

/**
 * Define a declaration unless the same entity is already present (engines
 * may share a catalog).
 */
const ensureDefined = (
  catalog: EntityCatalog,
  declaration: EntityDeclaration
): void => {
  const existing = catalog.get(declaration.id);
  if (existing && existing.runtime === declaration.runtime) return;
  catalog.define(declaration);
};

export const createDispatchEngine = (
  options: DispatchEngineOptions
): DispatchEngine => {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? createLogger({ verbose: config.verbose });
  const catalog = options.catalog ?? createEntityCatalog();

  for (const declaration of ENGINE_ENTITIES) {
    ensureDefined(catalog, declaration);
  }
  for (const module of options.modules) {
    for (const declaration of module.entities ?? []) {
      ensureDefined(catalog, declaration);
    }
  }

  const resolver = buildResolver(catalog);

  const entries = options.modules.flatMap((module) =>
    module.operators.map((operator) => {
      const signature = operatorSignature(resolver, operator);
      return {
        item: signature,
        entityId: signature.entity.id,
        dependsOn: signature.entity.dependsOn,
      };
    })
  );
  const signatures = Object.freeze([
    ...orderByPrecedence(
      entries,
      options.modules.flatMap((module) => module.precedence ?? [])
    ),
  ]);
  const operators = Object.freeze(signatures.map((signature) => signature.operator));

  logger.debug(
    `Assembled ${options.modules.map((module) => module.name).join(", ") || "no modules"}`
  );
  logger.debug(
    `Operator order: ${signatures.map((signature) => signature.entity.id).join(", ")}`
  );

  const createContext = (): DispatchContext =>
    createDispatchContext({ catalog, resolver, signatures, config, logger });

  return {
    catalog,
    resolver,
    config,
    logger,
    operators,
    signatures,
    createContext,
    eval: <R>(operation: Operation<R>): R => createContext().eval(operation),
    evalSuccess: (operation) => createContext().evalSuccess(operation),
    evaluate: <R>(operation: Operation<R>): Result<R, Diagnostic> =>
      createContext().evaluate(operation),
    supports: (operation) => createContext().supports(operation),
  };
};
