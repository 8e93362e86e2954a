import type { Readable } from "../position.js";
import { Transform } from "./transform.js";

/**
 * Copy the source value's state onto the value held by the target.
 *
 * - `to`: single-use, first success wins
 * - `safely`: may be evaluated again after it completes
 * - `merging`: every supporting copier contributes
 */
export class Copy<SOURCE, TARGET> extends Transform<
  SOURCE,
  TARGET,
  void,
  Readable<TARGET>
> {
  static to<SOURCE, TARGET>(
    target: Readable<TARGET>,
    source: Readable<SOURCE>
  ): Copy<SOURCE, TARGET> {
    return new Copy(source, target);
  }

  static safely<SOURCE, TARGET>(
    target: Readable<TARGET>,
    source: Readable<SOURCE>
  ): Copy<SOURCE, TARGET> {
    return new Copy(source, target, { safe: true });
  }

  static merging<SOURCE, TARGET>(
    target: Readable<TARGET>,
    source: Readable<SOURCE>
  ): Copy<SOURCE, TARGET> {
    return new Copy(source, target, { aggregation: "aggregateAny" });
  }

  getResult(): void {
    if (!this.isSuccessful()) {
      super.getResult();
    }
  }

  describe(): string {
    return `Copy ${String(this.getSourcePosition())} to ${String(this.getTargetPosition())}`;
  }
}
