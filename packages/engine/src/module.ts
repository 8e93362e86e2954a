/**
 * Operator modules - the unit of engine assembly
 */

import type { EntityDeclaration } from "@generis/core";
import type { AnyOperator } from "./operator.js";
import type { PrecedencePair } from "./precedence.js";

export type OperatorModule = {
  readonly name: string;
  /** Declarations for the module's operators and any entities they use */
  readonly entities?: readonly EntityDeclaration[];
  readonly operators: readonly AnyOperator[];
  /** Extra ordering constraints between operator entity ids */
  readonly precedence?: readonly PrecedencePair[];
};

/**
 * Combine modules into one, keeping their order.
 */
export const combineModules = (
  name: string,
  modules: readonly OperatorModule[]
): OperatorModule => ({
  name,
  entities: modules.flatMap((module) => module.entities ?? []),
  operators: modules.flatMap((module) => module.operators),
  precedence: modules.flatMap((module) => module.precedence ?? []),
});
