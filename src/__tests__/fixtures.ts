import { isObjectMappingError, type MapperError } from "../definers/defineError";
import type { TypeSerializer } from "../serialize/TypeSerializer";
import { TypeSerializers } from "../serialize/TypeSerializers";
import type { TypeToken } from "../tokens/TypeToken";
import { ConfigurationNode } from "../tree/ConfigurationNode";

/**
 * Runs `fn` and returns the mapper error it throws. Fails the test when it
 * returns normally or throws anything else.
 */
export function catchMapperError(fn: () => unknown): MapperError {
  try {
    fn();
  } catch (error) {
    if (isObjectMappingError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a mapper error to be thrown");
}

/** The default serializer for `type`, failing the test when there is none */
export function defaultSerializerFor(type: TypeToken): TypeSerializer<unknown> {
  const serializer = TypeSerializers.getDefaultSerializers().get(type);
  if (!serializer) {
    throw new Error(`No default serializer for ${type.toString()}`);
  }
  return serializer;
}

/** Decodes `value` as `type` through the default serializers */
export function decode(type: TypeToken, value: unknown): unknown {
  const node = ConfigurationNode.root().getNode("value");
  if (value !== undefined) {
    node.setValue(value);
  }
  return defaultSerializerFor(type).deserialize(type, node);
}

/** Encodes `value` as `type` and returns the plain tree value */
export function encode(type: TypeToken, value: unknown): unknown {
  const root = ConfigurationNode.root();
  defaultSerializerFor(type).serialize(type, value, root.getNode("value"));
  return root.getNode("value").getValue();
}
