import { invalidMapKeyError, noSerializerError } from "../../errors";
import { ListType, MapType } from "../../tokens/builtins";
import type { RawType } from "../../tokens/RawType";
import type { TypeToken } from "../../tokens/TypeToken";
import { isScalar } from "../../tree/coerce";
import { describePath, type ConfigNode } from "../../tree/types";
import type { TypeSerializer } from "../TypeSerializer";

/** The argument at `index` of `container` as seen from `type` */
const parameterOf = (
  type: TypeToken,
  container: RawType,
  index: number,
): TypeToken => (type.getSupertype(container) ?? type).getParameter(index);

const requireSerializer = (
  node: ConfigNode,
  type: TypeToken,
): TypeSerializer<unknown> => {
  const serializer = node.getOptions().serializers.get(type);
  if (!serializer) {
    throw noSerializerError.create({ type: type.toString() });
  }
  return serializer;
};

/**
 * Lists read from list nodes, or from a lone scalar as a one-element list.
 */
export const listSerializer: TypeSerializer<unknown[]> = {
  deserialize: (type, node) => {
    const elementType = parameterOf(type, ListType, 0);
    const elements = requireSerializer(node, elementType);
    if (node.hasListChildren()) {
      return node
        .getChildrenList()
        .map((child) => elements.deserialize(elementType, child));
    }
    if (node.getValue() !== undefined) {
      return [elements.deserialize(elementType, node)];
    }
    return [];
  },
  serialize: (type, value, node) => {
    const elementType = parameterOf(type, ListType, 0);
    const elements = requireSerializer(node, elementType);
    node.setValue([]);
    for (const element of value) {
      elements.serialize(elementType, element, node.getAppendedNode());
    }
  },
};

/**
 * Maps keep source order. Keys are decoded from a throwaway node holding the
 * raw key; entries whose key or value decodes to nothing are dropped.
 */
export const mapSerializer: TypeSerializer<Map<unknown, unknown>> = {
  deserialize: (type, node) => {
    const result = new Map<unknown, unknown>();
    if (!node.hasMapChildren()) {
      return result;
    }
    const keyType = parameterOf(type, MapType, 0);
    const valueType = parameterOf(type, MapType, 1);
    const keys = requireSerializer(node, keyType);
    const values = requireSerializer(node, valueType);
    for (const [rawKey, child] of node.getChildrenMap()) {
      const key = keys.deserialize(keyType, node.createRoot().setValue(rawKey));
      const value = values.deserialize(valueType, child);
      if (key === undefined || value === undefined) {
        continue;
      }
      result.set(key, value);
    }
    return result;
  },
  serialize: (type, value, node) => {
    const keyType = parameterOf(type, MapType, 0);
    const valueType = parameterOf(type, MapType, 1);
    const keys = requireSerializer(node, keyType);
    const values = requireSerializer(node, valueType);
    node.setValue({});
    for (const [key, entry] of value) {
      if (entry === undefined || entry === null) {
        continue;
      }
      const keyNode = node.createRoot();
      keys.serialize(keyType, key, keyNode);
      const wireKey = keyNode.getValue();
      if (!isScalar(wireKey)) {
        throw invalidMapKeyError.create({
          path: describePath(node),
          type: keyType.toString(),
        });
      }
      values.serialize(valueType, entry, node.getNode(String(wireKey)));
    }
  },
};
