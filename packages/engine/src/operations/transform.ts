import type { Position, Readable } from "../position.js";
import type { OperationOptions } from "../operation.js";
import { Operation } from "../operation.js";

/**
 * Operation reading a source position and acting on a target position.
 */
export abstract class Transform<
  SOURCE,
  TARGET,
  RESULT,
  TP extends Position<TARGET> = Position<TARGET>,
> extends Operation<RESULT> {
  constructor(
    private readonly sourcePosition: Readable<SOURCE>,
    private readonly targetPosition: TP,
    options?: OperationOptions
  ) {
    super(options);
  }

  getSourcePosition(): Readable<SOURCE> {
    return this.sourcePosition;
  }

  getTargetPosition(): TP {
    return this.targetPosition;
  }

  positions(): readonly Position<unknown>[] {
    return [this.sourcePosition, this.targetPosition];
  }
}
