/**
 * Generis Operators - the standard operators and property introspection
 */

export { isIterable, isIterator, isMissing, isObject } from "./values.js";
export {
  createPropertyResolverChain,
  defaultPropertyResolver,
  mapPropertyResolver,
  plainObjectPropertyResolver,
} from "./properties/property-resolver.js";
export type { PropertyResolver } from "./properties/property-resolver.js";
export { createProperties, PropertyPosition } from "./properties/property.js";
export { mapValueAt, MapValuePosition } from "./properties/map-value-position.js";
export type {
  Properties,
  PropertyAccess,
  PropertyPositionFactory,
} from "./properties/property.js";

export {
  SizeOfArray,
  SizeOfCollection,
  SizeOfIterable,
  SizeOfIterator,
  SizeOfMap,
} from "./size.js";
export {
  GetArrayElementType,
  GetIterableElementType,
  GetIteratorElementType,
  GetMapElementType,
} from "./element-type.js";
export { CopyingConverter, IterableToIterator, NopConverter } from "./convert.js";
export type { CopyDestinationConstructor } from "./convert.js";
export { DefaultToArrayConverter, DefaultToListConverter } from "./convert-to-collection.js";
export {
  BeanCopier,
  BeanToMapCopier,
  ConvertingCopier,
  IGNORED_BEAN_PROPERTIES,
  MapCopier,
  NullBehavior,
} from "./copy.js";
export { PropertyCopier } from "./property-copier.js";
export type {
  PropertyCopierDefinition,
  PropertyMappingValue,
  PropertyMatching,
} from "./property-copier.js";
export {
  AddAllFromIterable,
  AddEntryToMap,
  AddToCollection,
  isMapEntry,
  SimpleEntry,
} from "./add.js";
export type { MapEntry } from "./add.js";
export { DefaultImmutableChecker } from "./immutable.js";
export { STANDARD_OPERATOR_ENTITIES } from "./entities.js";
export { STANDARD_MODULE_NAME, standardModule } from "./standard-module.js";
export type { StandardModuleOptions } from "./standard-module.js";
