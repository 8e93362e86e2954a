/**
 * Operator contract
 *
 * An operator's entity binds `Operator<OPERATION>` to the operation type it
 * handles; the engine checks that signature before calling `supports`.
 */

import type { DispatchContext } from "./context.js";
import type { Operation } from "./operation.js";

export interface Operator<OPERATION extends Operation<unknown>> {
  /**
   * Whether this operator can perform `operation`. May ask the context
   * about hypothetical nested operations.
   */
  supports(context: DispatchContext, operation: OPERATION): boolean;

  /** Perform the operation; false reports failure */
  perform(context: DispatchContext, operation: OPERATION): boolean;
}

export type AnyOperator = Operator<Operation<unknown>>;

/**
 * Operator whose signature is the whole of its support check.
 */
export abstract class OptimisticOperator<OPERATION extends Operation<unknown>>
  implements Operator<OPERATION>
{
  supports(_context: DispatchContext, _operation: OPERATION): boolean {
    return true;
  }

  abstract perform(context: DispatchContext, operation: OPERATION): boolean;
}
