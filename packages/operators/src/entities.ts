/**
 * Catalog declarations for the standard operators
 */

import type { EntityDeclaration } from "@generis/core";
import { AddAllFromIterable, AddEntryToMap, AddToCollection, SimpleEntry } from "./add.js";
import { CopyingConverter, IterableToIterator, NopConverter } from "./convert.js";
import { DefaultToArrayConverter, DefaultToListConverter } from "./convert-to-collection.js";
import { BeanCopier, BeanToMapCopier, ConvertingCopier, MapCopier } from "./copy.js";
import {
  GetArrayElementType,
  GetIterableElementType,
  GetIteratorElementType,
  GetMapElementType,
} from "./element-type.js";
import { DefaultImmutableChecker } from "./immutable.js";
import { PropertyCopier } from "./property-copier.js";
import {
  SizeOfArray,
  SizeOfCollection,
  SizeOfIterable,
  SizeOfIterator,
  SizeOfMap,
} from "./size.js";

export const STANDARD_OPERATOR_ENTITIES: readonly EntityDeclaration[] = [
  {
    id: "SimpleEntry",
    typeParameters: ["K", "V"],
    implements: ["MapEntry<K, V>"],
    runtime: SimpleEntry,
  },

  // size
  {
    id: "SizeOfCollection",
    implements: ["Operator<Size<Collection<?>>>"],
    runtime: SizeOfCollection,
  },
  { id: "SizeOfMap", implements: ["Operator<Size<Map<?, ?>>>"], runtime: SizeOfMap },
  { id: "SizeOfArray", implements: ["Operator<Size<Object[]>>"], runtime: SizeOfArray },
  {
    id: "SizeOfIterable",
    implements: ["Operator<Size<Iterable<?>>>"],
    runtime: SizeOfIterable,
    dependsOn: ["SizeOfCollection"],
  },
  {
    id: "SizeOfIterator",
    implements: ["Operator<Size<Iterator<?>>>"],
    runtime: SizeOfIterator,
  },

  // element type
  {
    id: "GetArrayElementType",
    implements: ["Operator<GetElementType<?>>"],
    runtime: GetArrayElementType,
  },
  {
    id: "GetIterableElementType",
    implements: ["Operator<GetElementType<Iterable<?>>>"],
    runtime: GetIterableElementType,
  },
  {
    id: "GetIteratorElementType",
    implements: ["Operator<GetElementType<Iterator<?>>>"],
    runtime: GetIteratorElementType,
  },
  {
    id: "GetMapElementType",
    implements: ["Operator<GetElementType<Map<?, ?>>>"],
    runtime: GetMapElementType,
  },

  // conversion
  { id: "NopConverter", implements: ["Operator<Convert<?, ?>>"], runtime: NopConverter },
  {
    id: "IterableToIterator",
    implements: ["Operator<Convert<Iterable<?>, Iterator<?>>>"],
    runtime: IterableToIterator,
    dependsOn: ["NopConverter"],
  },
  {
    id: "DefaultToListConverter",
    implements: ["Operator<Convert<?, List<?>>>"],
    runtime: DefaultToListConverter,
    dependsOn: ["NopConverter"],
  },
  {
    id: "DefaultToArrayConverter",
    implements: ["Operator<Convert<?, Object[]>>"],
    runtime: DefaultToArrayConverter,
    dependsOn: ["NopConverter"],
  },
  {
    id: "CopyingConverter",
    typeParameters: ["TARGET"],
    implements: ["Operator<Convert<?, ? super TARGET>>"],
    runtime: CopyingConverter,
    bindings: [{ accessor: "targetTyped", returns: "Typed<TARGET>" }],
    dependsOn: ["NopConverter"],
  },

  // adding
  {
    id: "AddToCollection",
    implements: ["Operator<Add<?, Collection<?>>>"],
    runtime: AddToCollection,
  },
  {
    id: "AddEntryToMap",
    implements: ["Operator<Add<MapEntry<?, ?>, Map<?, ?>>>"],
    runtime: AddEntryToMap,
  },
  {
    id: "AddAllFromIterable",
    implements: ["Operator<AddAll<Iterable<?>, ?>>"],
    runtime: AddAllFromIterable,
  },

  // copying
  {
    id: "ConvertingCopier",
    implements: ["Operator<Copy<?, ?>>"],
    runtime: ConvertingCopier,
  },
  {
    id: "MapCopier",
    implements: ["Operator<Copy<Map<?, ?>, Map<?, ?>>>"],
    runtime: MapCopier,
    dependsOn: ["AddEntryToMap"],
  },
  {
    id: "BeanToMapCopier",
    implements: ["Operator<Copy<?, Map<?, ?>>>"],
    runtime: BeanToMapCopier,
    dependsOn: ["NopConverter", "ConvertingCopier", "MapCopier"],
  },
  {
    id: "BeanCopier",
    implements: ["Operator<Copy<?, ?>>"],
    runtime: BeanCopier,
    dependsOn: ["ConvertingCopier", "MapCopier", "BeanToMapCopier", "NopConverter"],
  },
  // configured by subclasses, each declared as extending PropertyCopier<SOURCE, TARGET>
  {
    id: "PropertyCopier",
    typeParameters: ["SOURCE", "TARGET"],
    implements: ["Operator<Copy<SOURCE, TARGET>>"],
    runtime: PropertyCopier,
    dependsOn: ["ConvertingCopier", "NopConverter"],
  },

  // immutability
  {
    id: "DefaultImmutableChecker",
    implements: ["Operator<ImmutableCheck<?>>"],
    runtime: DefaultImmutableChecker,
  },
];
