import type { TypeToken } from "../tokens/TypeToken";
import type { ConfigNode } from "../tree/types";

/**
 * Converts between a node and a value of one family of types. `type` is the
 * fully resolved type being read or written, so one serializer can serve
 * every parameterization it is registered for.
 */
export interface TypeSerializer<T> {
  /** `undefined` means "no value"; the caller decides what absence means */
  deserialize(type: TypeToken, node: ConfigNode): T | undefined;
  serialize(type: TypeToken, value: T, node: ConfigNode): void;
}
