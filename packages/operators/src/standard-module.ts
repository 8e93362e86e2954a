/**
 * The standard operator module
 */

import type { OperatorModule } from "@generis/engine";
import { AddAllFromIterable, AddEntryToMap, AddToCollection } from "./add.js";
import { IterableToIterator, NopConverter } from "./convert.js";
import { DefaultToArrayConverter, DefaultToListConverter } from "./convert-to-collection.js";
import { BeanCopier, BeanToMapCopier, ConvertingCopier, MapCopier } from "./copy.js";
import {
  GetArrayElementType,
  GetIterableElementType,
  GetIteratorElementType,
  GetMapElementType,
} from "./element-type.js";
import { STANDARD_OPERATOR_ENTITIES } from "./entities.js";
import { DefaultImmutableChecker } from "./immutable.js";
import type { PropertyResolver } from "./properties/property-resolver.js";
import { defaultPropertyResolver } from "./properties/property-resolver.js";
import {
  SizeOfArray,
  SizeOfCollection,
  SizeOfIterable,
  SizeOfIterator,
  SizeOfMap,
} from "./size.js";

export type StandardModuleOptions = {
  /** Property introspection used by BeanCopier and BeanToMapCopier */
  readonly propertyResolver?: PropertyResolver;
};

export const STANDARD_MODULE_NAME = "standard";

export const standardModule = (options: StandardModuleOptions = {}): OperatorModule => ({
  name: STANDARD_MODULE_NAME,
  entities: STANDARD_OPERATOR_ENTITIES,
  operators: [
    new SizeOfCollection(),
    new SizeOfMap(),
    new SizeOfArray(),
    new SizeOfIterable(),
    new SizeOfIterator(),
    new GetArrayElementType(),
    new GetIterableElementType(),
    new GetIteratorElementType(),
    new GetMapElementType(),
    new NopConverter(),
    new IterableToIterator(),
    new DefaultToListConverter(),
    new DefaultToArrayConverter(),
    new AddToCollection(),
    new AddEntryToMap(),
    new AddAllFromIterable(),
    new ConvertingCopier(),
    new MapCopier(),
    new BeanToMapCopier(options.propertyResolver ?? defaultPropertyResolver),
    new BeanCopier(options.propertyResolver ?? defaultPropertyResolver),
    new DefaultImmutableChecker(),
  ],
});
