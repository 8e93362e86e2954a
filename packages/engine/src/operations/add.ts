import type { Readable } from "../position.js";
import { Transform } from "./transform.js";

/**
 * Add the source value to the container held by the target. The result
 * tells whether the container changed.
 */
export class Add<SOURCE, TARGET> extends Transform<
  SOURCE,
  TARGET,
  boolean,
  Readable<TARGET>
> {
  static to<SOURCE, TARGET>(
    target: Readable<TARGET>,
    source: Readable<SOURCE>
  ): Add<SOURCE, TARGET> {
    return new Add(source, target);
  }

  describe(): string {
    return `Add ${String(this.getSourcePosition())} to ${String(this.getTargetPosition())}`;
  }
}

/**
 * Add every element of the source to the container held by the target.
 */
export class AddAll<SOURCE, TARGET> extends Transform<
  SOURCE,
  TARGET,
  boolean,
  Readable<TARGET>
> {
  static to<SOURCE, TARGET>(
    target: Readable<TARGET>,
    source: Readable<SOURCE>
  ): AddAll<SOURCE, TARGET> {
    return new AddAll(source, target);
  }

  describe(): string {
    return `Add all of ${String(this.getSourcePosition())} to ${String(this.getTargetPosition())}`;
  }
}
