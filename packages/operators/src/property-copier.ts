/**
 * Property copiers - copy by named property mappings and property matching
 *
 *   class PersonToContact extends PropertyCopier {
 *     constructor() {
 *       super({ mapping: [{ from: "name", to: "fullName" }], matching: {} });
 *     }
 *   }
 *
 * Each subclass is declared as an entity extending
 * `PropertyCopier<SOURCE, TARGET>`, which gives the copy types it accepts.
 */

import { fail } from "@generis/core";
import type { DispatchContext, Operator, Readable } from "@generis/engine";
import { Copy, ImmutableCheck, isWritable } from "@generis/engine";
import { NullBehavior } from "./copy.js";
import type { PropertyResolver } from "./properties/property-resolver.js";
import { defaultPropertyResolver } from "./properties/property-resolver.js";
import type { Properties } from "./properties/property.js";
import { createProperties } from "./properties/property.js";
import { isMissing } from "./values.js";

/**
 * One mapped value. A blank `from` reads the whole source; a blank `to`
 * writes the whole target.
 */
export type PropertyMappingValue = {
  readonly from?: string;
  readonly to?: string;
};

export type PropertyMatching = {
  /** Properties to match; empty means every readable source property writable on the target */
  readonly properties?: readonly string[];
  readonly exclude?: readonly string[];
};

export type PropertyCopierDefinition = {
  readonly mapping?: readonly PropertyMappingValue[];
  readonly matching?: PropertyMatching;
  readonly propertyResolver?: PropertyResolver;
};

type Mapping = {
  readonly from: string | undefined;
  readonly to: string | undefined;
};

const trimToUndefined = (text: string | undefined): string | undefined => {
  const trimmed = text?.trim();
  return trimmed ? trimmed : undefined;
};

const readMappings = (
  owner: string,
  definition: PropertyCopierDefinition
): readonly Mapping[] => {
  const { mapping, matching } = definition;
  if (mapping === undefined) {
    if (matching === undefined) {
      return fail(
        "GEN1005",
        `${owner} specifies neither a mapping nor a matching`,
        "Pass mapping, matching, or both to the PropertyCopier constructor"
      );
    }
    return [];
  }
  if (mapping.length === 0) {
    return fail("GEN1005", `${owner} has an empty mapping`);
  }
  return mapping.map((value) => {
    const from = trimToUndefined(value.from);
    const to = trimToUndefined(value.to);
    if (from === undefined && to === undefined) {
      return fail("GEN1005", `${owner} maps a value with both 'from' and 'to' blank`);
    }
    return { from, to };
  });
};

export abstract class PropertyCopier implements Operator<Copy<unknown, unknown>> {
  private readonly mappings: readonly Mapping[];
  private readonly matching: PropertyMatching | undefined;
  private readonly propertyResolver: PropertyResolver;

  constructor(definition: PropertyCopierDefinition) {
    this.mappings = readMappings(this.constructor.name, definition);
    this.matching = definition.matching;
    this.propertyResolver = definition.propertyResolver ?? defaultPropertyResolver;
  }

  private properties(context: DispatchContext): Properties {
    return createProperties(context.catalog, this.propertyResolver);
  }

  private mapped(
    context: DispatchContext,
    copy: Copy<unknown, unknown>
  ): readonly Copy<unknown, unknown>[] {
    const properties = this.properties(context);
    const source = copy.getSourcePosition();
    const target = copy.getTargetPosition();
    return this.mappings.map(({ from, to }) =>
      Copy.to<unknown, unknown>(
        to === undefined ? target : properties.at(to).of(target),
        from === undefined ? source : properties.optional(from).of(source)
      )
    );
  }

  private matched(
    context: DispatchContext,
    copy: Copy<unknown, unknown>
  ): readonly Copy<unknown, unknown>[] {
    if (this.matching === undefined) return [];
    const properties = this.properties(context);
    const source = copy.getSourcePosition();
    const target = copy.getTargetPosition();
    const exclude = new Set(this.matching.exclude ?? []);
    const named = this.matching.properties ?? [];

    if (named.length > 0) {
      return [...new Set(named)]
        .filter((name) => !exclude.has(name))
        .map((name) =>
          Copy.to<unknown, unknown>(properties.at(name).of(target), properties.optional(name).of(source))
        );
    }

    // Lenient: whatever the source has that the target can take
    const sourceNames = new Set(properties.names(source));
    return properties
      .writableNames(target)
      .filter((name) => sourceNames.has(name) && !exclude.has(name))
      .map((name) =>
        Copy.safely<unknown, unknown>(
          properties.at(name).of(target),
          properties.optional(name).of(source)
        )
      )
      .filter((propertyCopy) => context.supports(propertyCopy));
  }

  private targetAccepts(context: DispatchContext, target: Readable<unknown>): boolean {
    return !isMissing(target.getValue()) && !context.evalSuccess(ImmutableCheck.of(target));
  }

  private nullBehavior(
    context: DispatchContext,
    copy: Copy<unknown, unknown>
  ): "unsupported" | "noop" | "setNulls" | undefined {
    return isMissing(copy.getSourcePosition().getValue())
      ? context.getTypedContext(NullBehavior)
      : undefined;
  }

  supports(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    if (!this.targetAccepts(context, copy.getTargetPosition())) return false;
    const behavior = this.nullBehavior(context, copy);
    if (behavior === "unsupported") return false;

    const mapped = this.mapped(context, copy);
    const matched = this.matched(context, copy);
    if (behavior !== undefined) {
      return mapped.length > 0 || matched.length > 0;
    }
    // Lenient matches are already known to be supported
    const copies = [...mapped, ...matched];
    return (
      copies.length > 0 &&
      copies.every((propertyCopy) => propertyCopy.safe || context.supports(propertyCopy))
    );
  }

  perform(context: DispatchContext, copy: Copy<unknown, unknown>): boolean {
    const behavior = this.nullBehavior(context, copy);
    if (behavior === "unsupported") return false;

    const mapped = this.mapped(context, copy);
    if (behavior === "noop" && mapped.length > 0) return true;
    const matched = this.matched(context, copy);
    if (behavior === "noop" && matched.length > 0) return true;

    const copies = [...mapped, ...matched];
    if (behavior === "setNulls") {
      for (const propertyCopy of copies) {
        const target = propertyCopy.getTargetPosition();
        if (isWritable(target)) target.setValue(null);
      }
      return copies.length > 0;
    }

    for (const propertyCopy of copies) {
      if (!context.evalSuccess(propertyCopy)) {
        return fail("GEN3001", `${propertyCopy.describe()} failed`);
      }
    }
    return copies.length > 0;
  }
}
