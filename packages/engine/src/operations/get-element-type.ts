import type { TypeExpression } from "@generis/core";
import { formatType } from "@generis/core";
import type { Position, Readable } from "../position.js";
import { box } from "../positions.js";
import { Operation } from "../operation.js";

/**
 * Element type of a container type, e.g. `String` for `List<String>`.
 */
export class GetElementType<T> extends Operation<TypeExpression> {
  private readonly typedItem: Readable<T | undefined>;

  constructor(type: TypeExpression) {
    super();
    this.typedItem = box<T>(type);
  }

  static of<T>(type: TypeExpression): GetElementType<T> {
    return new GetElementType<T>(type);
  }

  getTypedItem(): Readable<T | undefined> {
    return this.typedItem;
  }

  positions(): readonly Position<unknown>[] {
    return [this.typedItem];
  }

  describe(): string {
    return `Get element type of ${formatType(this.typedItem.getType())}`;
  }
}
