/**
 * Size operators
 */

import { named } from "@generis/core";
import type { DispatchContext } from "@generis/engine";
import { OptimisticOperator, readOnly, Size } from "@generis/engine";
import { isIterable, isIterator, isMissing } from "./values.js";

/** Arrays and sets; a missing collection has size 0 */
export class SizeOfCollection extends OptimisticOperator<Size<unknown>> {
  perform(_context: DispatchContext, size: Size<unknown>): boolean {
    const value = size.getPosition().getValue();
    if (isMissing(value)) {
      size.setResult(0);
      return true;
    }
    if (Array.isArray(value)) {
      size.setResult(value.length);
      return true;
    }
    if (value instanceof Set) {
      size.setResult(value.size);
      return true;
    }
    return false;
  }
}

export class SizeOfMap extends OptimisticOperator<Size<unknown>> {
  perform(_context: DispatchContext, size: Size<unknown>): boolean {
    const value = size.getPosition().getValue();
    if (isMissing(value)) {
      size.setResult(0);
      return true;
    }
    if (!(value instanceof Map)) return false;
    size.setResult(value.size);
    return true;
  }
}

export class SizeOfArray extends OptimisticOperator<Size<unknown>> {
  perform(_context: DispatchContext, size: Size<unknown>): boolean {
    const value = size.getPosition().getValue();
    if (isMissing(value)) {
      size.setResult(0);
      return true;
    }
    if (!Array.isArray(value)) return false;
    size.setResult(value.length);
    return true;
  }
}

/**
 * Counts by forwarding to the size of a fresh iterator.
 */
export class SizeOfIterable extends OptimisticOperator<Size<unknown>> {
  perform(context: DispatchContext, size: Size<unknown>): boolean {
    const value = size.getPosition().getValue();
    if (isMissing(value)) {
      size.setResult(0);
      return true;
    }
    if (!isIterable(value)) return false;
    return context.forwardTo(
      Size.of(readOnly(named("Iterator"), value[Symbol.iterator]())),
      (count) => size.setResult(count)
    );
  }
}

/** Consumes the iterator */
export class SizeOfIterator extends OptimisticOperator<Size<unknown>> {
  perform(_context: DispatchContext, size: Size<unknown>): boolean {
    const iterator = size.getPosition().getValue();
    if (isMissing(iterator)) {
      size.setResult(0);
      return true;
    }
    if (!isIterator(iterator)) return false;
    let count = 0;
    for (let step = iterator.next(); step.done !== true; step = iterator.next()) {
      count++;
    }
    size.setResult(count);
    return true;
  }
}
