/**
 * Catalog declarations for positions, the standard operations and the
 * operator contract.
 */

import type { EntityDeclaration } from "@generis/core";
import { Operation } from "./operation.js";
import { Add, AddAll } from "./operations/add.js";
import { Convert } from "./operations/convert.js";
import { Copy } from "./operations/copy.js";
import { GetElementType } from "./operations/get-element-type.js";
import { ImmutableCheck } from "./operations/immutable-check.js";
import { Size } from "./operations/size.js";
import { Transform } from "./operations/transform.js";

export const OPERATION_ENTITY_ID = "Operation";
export const OPERATOR_ENTITY_ID = "Operator";
export const OPERATOR_PARAMETER = "OPERATION";

export const ENGINE_ENTITIES: readonly EntityDeclaration[] = [
  {
    id: "Position",
    kind: "interface",
    typeParameters: ["T"],
    implements: ["Typed<T>"],
  },
  {
    id: "Position.Readable",
    kind: "interface",
    typeParameters: ["T"],
    implements: ["Position<T>"],
  },
  {
    id: "Position.Writable",
    kind: "interface",
    typeParameters: ["T"],
    implements: ["Position<T>"],
  },
  {
    id: "Position.ReadWrite",
    kind: "interface",
    typeParameters: ["T"],
    implements: ["Position.Readable<T>", "Position.Writable<T>"],
  },
  { id: OPERATION_ENTITY_ID, typeParameters: ["RESULT"], runtime: Operation },
  {
    id: "Transform",
    typeParameters: ["SOURCE", "TARGET", "RESULT"],
    extends: "Operation<RESULT>",
    runtime: Transform,
    bindings: [
      { accessor: "getSourcePosition", returns: "Position.Readable<SOURCE>" },
      { accessor: "getTargetPosition", returns: "Position<TARGET>" },
    ],
  },
  {
    id: "Convert",
    typeParameters: ["SOURCE", "TARGET"],
    extends: "Transform<SOURCE, TARGET, TARGET>",
    runtime: Convert,
  },
  {
    id: "Copy",
    typeParameters: ["SOURCE", "TARGET"],
    extends: "Transform<SOURCE, TARGET, Object>",
    runtime: Copy,
  },
  {
    id: "Add",
    typeParameters: ["SOURCE", "TARGET"],
    extends: "Transform<SOURCE, TARGET, Boolean>",
    runtime: Add,
  },
  {
    id: "AddAll",
    typeParameters: ["SOURCE", "TARGET"],
    extends: "Transform<SOURCE, TARGET, Boolean>",
    runtime: AddAll,
  },
  {
    id: "Size",
    typeParameters: ["T"],
    extends: "Operation<Number>",
    runtime: Size,
    bindings: [{ accessor: "getPosition", returns: "Position.Readable<T>" }],
  },
  {
    id: "GetElementType",
    typeParameters: ["T"],
    extends: "Operation",
    runtime: GetElementType,
    bindings: [{ accessor: "getTypedItem", returns: "Position.Readable<T>" }],
  },
  {
    id: "ImmutableCheck",
    typeParameters: ["T"],
    extends: "Operation<Boolean>",
    runtime: ImmutableCheck,
    bindings: [{ accessor: "getPosition", returns: "Position.Readable<T>" }],
  },
  {
    id: OPERATOR_ENTITY_ID,
    kind: "interface",
    typeParameters: [{ name: OPERATOR_PARAMETER, bounds: ["Operation"] }],
  },
];
