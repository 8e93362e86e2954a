import type { Readable, Writable } from "../position.js";
import { isReadable } from "../position.js";
import { Transform } from "./transform.js";

/**
 * Convert the source value into the target position. The result is the
 * value the target holds afterwards.
 */
export class Convert<SOURCE, TARGET> extends Transform<
  SOURCE,
  TARGET,
  TARGET,
  Writable<TARGET>
> {
  static to<SOURCE, TARGET>(
    target: Writable<TARGET>,
    source: Readable<SOURCE>
  ): Convert<SOURCE, TARGET> {
    return new Convert(source, target);
  }

  getResult(): TARGET {
    const target = this.getTargetPosition();
    if (this.isSuccessful() && isReadable<TARGET>(target)) {
      return target.getValue();
    }
    return super.getResult();
  }

  describe(): string {
    return `Convert ${String(this.getSourcePosition())} to ${String(this.getTargetPosition())}`;
  }
}
