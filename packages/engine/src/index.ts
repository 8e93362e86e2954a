/**
 * Generis Engine - positions, operations and the operator dispatch engine
 */

export type { Position, Readable, ReadWrite, Writable } from "./position.js";
export { isReadable, isWritable, positionsEqual, RelativePosition } from "./position.js";
export { box, readOnly, readOnlyValue, readWrite, writable } from "./positions.js";

export { Operation } from "./operation.js";
export type { AggregationMode, OperationOptions, OperationState } from "./operation.js";
export {
  Add,
  AddAll,
  Convert,
  Copy,
  GetElementType,
  ImmutableCheck,
  Size,
  Transform,
} from "./operations/index.js";

export type { AnyOperator, Operator } from "./operator.js";
export { OptimisticOperator } from "./operator.js";
export {
  ENGINE_ENTITIES,
  OPERATION_ENTITY_ID,
  OPERATOR_ENTITY_ID,
  OPERATOR_PARAMETER,
} from "./entities.js";
export { matchesSignature, operatorSignature } from "./matching.js";
export type { Expectation, OperatorSignature } from "./matching.js";
export { orderByPrecedence } from "./precedence.js";
export type { PrecedenceEntry, PrecedencePair } from "./precedence.js";
export { combineModules } from "./module.js";
export type { OperatorModule } from "./module.js";

export { booleanHint, defineEnumHint, defineHint } from "./hints.js";
export type { Hint, HintKind } from "./hints.js";
export { createDispatchContext } from "./context.js";
export type { DispatchContext, DispatchContextOptions } from "./context.js";
export { createDispatchEngine } from "./engine.js";
export type { DispatchEngine, DispatchEngineOptions } from "./engine.js";

export {
  CONFIG_FILE_NAME,
  DEFAULT_MAX_DEPTH,
  findConfig,
  loadConfig,
  resolveConfig,
} from "./config.js";
export type { GenerisConfig, ResolvedConfig } from "./config.js";
export { createLogger, silentLogger } from "./logging.js";
export type { Logger, LoggerOptions, LogSink } from "./logging.js";
