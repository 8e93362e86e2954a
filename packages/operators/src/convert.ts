/**
 * Converters
 */

import type { TypeExpression } from "@generis/core";
import { fail, formatType, named } from "@generis/core";
import type { Convert, DispatchContext, Operator, Readable } from "@generis/engine";
import { box, Copy, readOnly } from "@generis/engine";
import { isIterable, isMissing } from "./values.js";

/**
 * Passes the source value through when the target type already accepts it.
 */
export class NopConverter implements Operator<Convert<unknown, unknown>> {
  supports(context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    return context.resolver.isInstance(
      convert.getSourcePosition().getValue(),
      convert.getTargetPosition().getType()
    );
  }

  perform(_context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    const value = convert.getSourcePosition().getValue();
    convert.getTargetPosition().setValue(value);
    convert.setResult(value);
    return true;
  }
}

export class IterableToIterator implements Operator<Convert<unknown, unknown>> {
  supports(_context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    return isIterable(convert.getSourcePosition().getValue());
  }

  perform(_context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    const iterable = convert.getSourcePosition().getValue();
    if (!isIterable(iterable)) return false;
    const iterator = iterable[Symbol.iterator]();
    convert.getTargetPosition().setValue(iterator);
    convert.setResult(iterator);
    return true;
  }
}

export type CopyDestinationConstructor<TARGET> = new () => TARGET;

const toType = (type: TypeExpression | string): TypeExpression =>
  typeof type === "string" ? named(type) : type;

/**
 * Converts by creating a new TARGET and copying the source onto it.
 *
 *   CopyingConverter.forTargetType("app.Person", Person)
 *   CopyingConverter.implementing("app.Named").with(Person)
 *
 * The target type is the converter's binding of TARGET, so each instance
 * matches conversions to its own type (or a supertype of it).
 */
export class CopyingConverter<TARGET> implements Operator<Convert<unknown, unknown>> {
  /** Prefer `forTargetType` or `implementing`, which check the constructor */
  constructor(
    private readonly targetType: TypeExpression,
    private readonly create: CopyDestinationConstructor<TARGET>
  ) {}

  static forTargetType<TARGET>(
    targetType: TypeExpression | string,
    ctor: CopyDestinationConstructor<TARGET>
  ): CopyingConverter<TARGET> {
    return CopyingConverter.implementing(targetType).with(ctor);
  }

  static implementing(targetType: TypeExpression | string): {
    readonly with: <TARGET>(ctor: CopyDestinationConstructor<TARGET>) => CopyingConverter<TARGET>;
  } {
    const type = toType(targetType);
    return {
      with: <TARGET>(ctor: CopyDestinationConstructor<TARGET>): CopyingConverter<TARGET> => {
        if (ctor.length !== 0) {
          return fail(
            "GEN1003",
            `${ctor.name} cannot serve as the copy destination for ${formatType(type)}: its constructor takes ${ctor.length} parameter(s)`,
            "Copy destinations are created with a no-argument constructor"
          );
        }
        return new CopyingConverter(type, ctor);
      },
    };
  }

  /** Binding of TARGET */
  targetTyped(): Readable<TARGET | undefined> {
    return box<TARGET>(this.targetType);
  }

  supports(context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    const source = convert.getSourcePosition();
    const targetType = convert.getTargetPosition().getType();
    return (
      !isMissing(source.getValue()) &&
      context.resolver.isAssignable(this.targetType, targetType) &&
      context.supports(Copy.to(box(targetType), source))
    );
  }

  perform(context: DispatchContext, convert: Convert<unknown, unknown>): boolean {
    const destination = new this.create();
    convert.getTargetPosition().setValue(destination);
    convert.setResult(destination);
    return context.forwardTo(
      Copy.to(readOnly(this.targetType, destination), convert.getSourcePosition())
    );
  }

  toString(): string {
    return `CopyingConverter<${formatType(this.targetType)}>`;
  }
}
