import type { DispatchContext, ImmutableCheck } from "@generis/engine";
import { OptimisticOperator } from "@generis/engine";
import { isObject } from "./values.js";

/**
 * Missing values, primitives and frozen objects are immutable; anything
 * else fails the check.
 */
export class DefaultImmutableChecker extends OptimisticOperator<ImmutableCheck<unknown>> {
  perform(_context: DispatchContext, check: ImmutableCheck<unknown>): boolean {
    const value = check.getPosition().getValue();
    const immutable = !isObject(value) || Object.isFrozen(value);
    check.setResult(immutable);
    return immutable;
  }
}
