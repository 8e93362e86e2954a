/**
 * Copiers
 */

import type { PlaceholderType, TypeExpression } from "@generis/core";
import { named, objectType } from "@generis/core";
import type { DispatchContext, Operator, Readable } from "@generis/engine";
import {
  Add,
  Convert,
  Copy,
  defineEnumHint,
  isWritable,
  readOnly,
  readWrite,
  writable,
} from "@generis/engine";
import { SimpleEntry } from "./add.js";
import { mapValueAt } from "./properties/map-value-position.js";
import type { PropertyResolver } from "./properties/property-resolver.js";
import { defaultPropertyResolver } from "./properties/property-resolver.js";
import { createProperties } from "./properties/property.js";
import { isMissing } from "./values.js";

/**
 * What a bean copy does when its source value is missing:
 * - unsupported: the copy is not supported
 * - noop: the copy succeeds without touching the target
 * - setNulls: every writable target property is set to null
 */
export const NullBehavior = defineEnumHint(
  "nullBehavior",
  ["unsupported", "noop", "setNulls"],
  "noop"
);

/**
 * Copies by converting the source into a writable target.
 */
export class ConvertingCopier implements Operator<Copy<unknown, unknown>> {
  supports(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    const target = copy.getTargetPosition();
    return (
      isWritable(target) && context.supports(Convert.to(target, copy.getSourcePosition()))
    );
  }

  perform(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    const target = copy.getTargetPosition();
    return (
      isWritable(target) && context.forwardTo(Convert.to(target, copy.getSourcePosition()))
    );
  }
}

type MapTypes = {
  readonly sourceKey: TypeExpression;
  readonly sourceValue: TypeExpression;
  readonly targetKey: TypeExpression;
  readonly targetValue: TypeExpression;
  readonly entry: TypeExpression;
};

/**
 * Copies map entries, converting each key and value to the target's key and
 * value types.
 */
export class MapCopier implements Operator<Copy<unknown, unknown>> {
  private types(context: DispatchContext, copy: Copy<unknown, unknown>): MapTypes {
    const { resolver, catalog } = context;
    const key = catalog.param("Map", "K");
    const value = catalog.param("Map", "V");
    const argument = (type: TypeExpression, p: PlaceholderType): TypeExpression | undefined => {
      const map = resolver.typeArguments(type, "Map");
      return map === undefined ? undefined : resolver.unroll(map, p);
    };

    const sourceType = copy.getSourcePosition().getType();
    const targetType = copy.getTargetPosition().getType();
    const targetKey = argument(targetType, key);
    const targetValue = argument(targetType, value);
    return {
      sourceKey: argument(sourceType, key) ?? objectType,
      sourceValue: argument(sourceType, value) ?? objectType,
      targetKey: targetKey ?? objectType,
      targetValue: targetValue ?? objectType,
      entry:
        targetKey === undefined || targetValue === undefined
          ? named("MapEntry")
          : named("MapEntry", targetKey, targetValue),
    };
  }

  supports(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    const source = copy.getSourcePosition().getValue();
    if (!(source instanceof Map)) return false;

    const types = this.types(context, copy);
    // One entry stands for all of them
    if (
      !context.supports(
        Add.to(
          copy.getTargetPosition(),
          readOnly(types.entry, new SimpleEntry(undefined, undefined))
        )
      )
    ) {
      return false;
    }

    for (const [key, value] of source) {
      if (
        !context.supports(
          Convert.to(writable(types.targetKey), readOnly(types.sourceKey, key))
        ) ||
        !context.supports(
          Convert.to(writable(types.targetValue), readOnly(types.sourceValue, value))
        )
      ) {
        return false;
      }
    }
    return true;
  }

  perform(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    const source = copy.getSourcePosition().getValue();
    if (!(source instanceof Map)) return false;

    const types = this.types(context, copy);
    for (const [key, value] of source) {
      const targetKey = readWrite<unknown>(types.targetKey);
      const targetValue = readWrite<unknown>(types.targetValue);
      if (
        !context.evalSuccess(Convert.to(targetKey, readOnly(types.sourceKey, key))) ||
        !context.evalSuccess(Convert.to(targetValue, readOnly(types.sourceValue, value)))
      ) {
        return false;
      }
      const entry = new SimpleEntry(targetKey.getValue(), targetValue.getValue());
      if (!context.evalSuccess(Add.to(copy.getTargetPosition(), readOnly(types.entry, entry)))) {
        return false;
      }
    }
    return true;
  }
}

/** Bean properties BeanToMapCopier leaves out */
export const IGNORED_BEAN_PROPERTIES: readonly string[] = ["class"];

const stringType = named("String");

/**
 * Copies bean properties into map entries. Each property name is converted
 * to the target's key type; names that do not convert are skipped. Map
 * sources are left to MapCopier.
 */
export class BeanToMapCopier implements Operator<Copy<unknown, unknown>> {
  constructor(
    private readonly propertyResolver: PropertyResolver = defaultPropertyResolver,
    private readonly ignored: readonly string[] = IGNORED_BEAN_PROPERTIES
  ) {}

  private mapType(
    context: DispatchContext,
    copy: Copy<unknown, unknown>,
    parameter: "K" | "V"
  ): TypeExpression {
    const { resolver, catalog } = context;
    const map = resolver.typeArguments(copy.getTargetPosition().getType(), "Map");
    const bound = map === undefined ? undefined : resolver.unroll(map, catalog.param("Map", parameter));
    return bound ?? objectType;
  }

  private propertyNames(context: DispatchContext, source: Readable<unknown>): readonly string[] {
    return createProperties(context.catalog, this.propertyResolver)
      .names(source)
      .filter((name) => !this.ignored.includes(name));
  }

  supports(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    const source = copy.getSourcePosition();
    const sourceValue = source.getValue();
    const target = copy.getTargetPosition().getValue();
    if (sourceValue instanceof Map || !this.propertyResolver.handles(sourceValue)) return false;
    // A target without a value is a hypothetical destination
    if (!isMissing(target) && (!(target instanceof Map) || Object.isFrozen(target))) {
      return false;
    }

    const keyType = this.mapType(context, copy, "K");
    return this.propertyNames(context, source).some((name) =>
      context.supports(Convert.to(readWrite<unknown>(keyType), readOnly(stringType, name)))
    );
  }

  perform(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    const source = copy.getSourcePosition();
    const target = copy.getTargetPosition();
    if (!(target.getValue() instanceof Map)) return false;

    const keyType = this.mapType(context, copy, "K");
    const valueType = this.mapType(context, copy, "V");
    const properties = createProperties(context.catalog, this.propertyResolver);
    let copied = false;
    for (const name of this.propertyNames(context, source)) {
      const key = readWrite<unknown>(keyType);
      if (!context.evalSuccess(Convert.to(key, readOnly(stringType, name)))) continue;
      const entry = Copy.safely<unknown, unknown>(
        mapValueAt(key.getValue(), valueType).of(target),
        properties.at(name).of(source)
      );
      if (context.evalSuccess(entry)) {
        copied = true;
      }
    }
    return copied;
  }
}

/**
 * Copies every property the source and target share, one safe `Copy` per
 * property. A target without a value is a hypothetical destination: the
 * copy is supported whenever the source is a bean.
 */
export class BeanCopier implements Operator<Copy<unknown, unknown>> {
  constructor(private readonly propertyResolver: PropertyResolver = defaultPropertyResolver) {}

  private propertyCopies(
    context: DispatchContext,
    target: Readable<unknown>,
    source: Readable<unknown>
  ): readonly Copy<unknown, unknown>[] {
    const properties = createProperties(context.catalog, this.propertyResolver);
    const sourceNames = new Set(properties.names(source));
    return properties
      .writableNames(target)
      .filter((name) => sourceNames.has(name))
      .map((name) =>
        Copy.safely<unknown, unknown>(
          properties.at(name).of(target),
          properties.optional(name).of(source)
        )
      )
      .filter((propertyCopy) => context.supports(propertyCopy));
  }

  supports(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    const source = copy.getSourcePosition();
    const target = copy.getTargetPosition();
    const sourceValue = source.getValue();

    if (isMissing(sourceValue)) {
      const behavior = context.getTypedContext(NullBehavior);
      if (behavior === "unsupported") return false;
      return (
        isMissing(target.getValue()) ||
        createProperties(context.catalog, this.propertyResolver).writableNames(target)
          .length > 0
      );
    }
    if (!this.propertyResolver.handles(sourceValue)) return false;
    if (isMissing(target.getValue())) return true;
    return this.propertyCopies(context, target, source).length > 0;
  }

  perform(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    const source = copy.getSourcePosition();
    const target = copy.getTargetPosition();
    if (isMissing(target.getValue())) return false;

    if (isMissing(source.getValue())) {
      switch (context.getTypedContext(NullBehavior)) {
        case "unsupported":
          return false;
        case "noop":
          return true;
        case "setNulls": {
          const properties = createProperties(context.catalog, this.propertyResolver);
          for (const name of properties.writableNames(target)) {
            properties.at(name).of(target).setValue(null);
          }
          return true;
        }
      }
    }

    let copied = false;
    for (const propertyCopy of this.propertyCopies(context, target, source)) {
      if (context.evalSuccess(propertyCopy)) {
        copied = true;
      }
    }
    return copied;
  }
}
