import type { Position, Readable } from "../position.js";
import { Operation } from "../operation.js";

export class Size<T> extends Operation<number> {
  constructor(private readonly position: Readable<T>) {
    super();
  }

  static of<T>(position: Readable<T>): Size<T> {
    return new Size(position);
  }

  getPosition(): Readable<T> {
    return this.position;
  }

  positions(): readonly Position<unknown>[] {
    return [this.position];
  }

  describe(): string {
    return `Size of ${String(this.position)}`;
  }
}
