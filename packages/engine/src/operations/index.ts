export { Transform } from "./transform.js";
export { Convert } from "./convert.js";
export { Copy } from "./copy.js";
export { Size } from "./size.js";
export { GetElementType } from "./get-element-type.js";
export { ImmutableCheck } from "./immutable-check.js";
export { Add, AddAll } from "./add.js";
