/**
 * Marks a structured type declared through `serializable()`. Prefer the
 * `isMappedType` helper instead of touching it directly.
 * @internal
 */
export const symbolSerializable: unique symbol = Symbol.for(
  "mapper.serializable",
);
