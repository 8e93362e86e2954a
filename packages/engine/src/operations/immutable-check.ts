import type { Position, Readable } from "../position.js";
import { Operation } from "../operation.js";

/**
 * Succeeds when the position's value is known to be immutable.
 */
export class ImmutableCheck<T> extends Operation<boolean> {
  constructor(private readonly position: Readable<T>) {
    super();
  }

  static of<T>(position: Readable<T>): ImmutableCheck<T> {
    return new ImmutableCheck(position);
  }

  getPosition(): Readable<T> {
    return this.position;
  }

  positions(): readonly Position<unknown>[] {
    return [this.position];
  }

  describe(): string {
    return `Immutable check of ${String(this.position)}`;
  }
}
