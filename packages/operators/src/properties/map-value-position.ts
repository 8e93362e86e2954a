/**
 * Map value positions
 *
 *   mapValueAt("name", stringType).of(mapPosition)
 */

import type { TypeExpression } from "@generis/core";
import { fail } from "@generis/core";
import type { Readable } from "@generis/engine";
import { RelativePosition } from "@generis/engine";

export class MapValuePosition<P> extends RelativePosition<P, unknown> {
  constructor(
    parent: Readable<P>,
    readonly mapKey: unknown,
    private readonly valueType: TypeExpression
  ) {
    super(parent, String(mapKey));
  }

  getType(): TypeExpression {
    return this.valueType;
  }

  getValue(): unknown {
    const map = this.parent.getValue();
    return map instanceof Map ? map.get(this.mapKey) : undefined;
  }

  setValue(value: unknown): void {
    const map = this.parent.getValue();
    if (!(map instanceof Map)) {
      return fail("GEN3004", `Cannot write ${this.toString()}: ${String(this.parent)} holds no map`);
    }
    if (Object.isFrozen(map)) {
      return fail("GEN3004", `Cannot write ${this.toString()}: the map is frozen`);
    }
    map.set(this.mapKey, value);
  }

  toString(): string {
    return `Value at ${String(this.mapKey)} of ${String(this.parent)}`;
  }
}

export const mapValueAt = (
  key: unknown,
  valueType: TypeExpression
): { readonly of: <P>(parent: Readable<P>) => MapValuePosition<P> } => ({
  of: (parent) => new MapValuePosition(parent, key, valueType),
});
