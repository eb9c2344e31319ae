import {
  missingDiscriminatorError,
  notMappableTypeError,
  unknownClassError,
  unmappedRuntimeTypeError,
} from "../../errors";
import { isMappedType, type MappedType } from "../../objectmapping/MappedType";
import {
  findVariant,
  mappedTypeOf,
} from "../../objectmapping/definers/registry";
import type { TypeToken } from "../../tokens/TypeToken";
import type { ConfigNode } from "../../tree/types";
import type { TypeSerializer } from "../TypeSerializer";

/** Reserved key naming the concrete type of a value stored for an abstract type */
export const CLASS_KEY = "__class__";

const mappedRawOf = (type: TypeToken): MappedType => {
  const raw = type.getRawType();
  if (!raw || !isMappedType(raw)) {
    throw notMappableTypeError.create({ type: type.toString() });
  }
  return raw;
};

const concreteTypeFor = (type: TypeToken, node: ConfigNode): TypeToken => {
  const raw = mappedRawOf(type);
  if (!raw.abstract) {
    return type;
  }
  const name = node.getNode(CLASS_KEY).getString();
  if (name === undefined) {
    throw missingDiscriminatorError.create({ type: type.toString() });
  }
  const variant = findVariant(raw, name);
  if (!variant || variant.abstract) {
    throw unknownClassError.create({ name, type: type.toString() });
  }
  return variant.type;
};

/**
 * Records declared with `serializable()`. Values stored for an abstract
 * static type carry the concrete type's name under `__class__`.
 */
export const serializableSerializer: TypeSerializer<object> = {
  deserialize: (type, node) => {
    const concrete = concreteTypeFor(type, node);
    return node
      .getOptions()
      .mapperFactory.getMapper(concrete)
      .bindToNew()
      .populate(node);
  },
  serialize: (type, value, node) => {
    const runtime = mappedTypeOf(value);
    if (!runtime || runtime.abstract) {
      throw unmappedRuntimeTypeError.create({
        className: value.constructor.name,
      });
    }
    const staticRaw = mappedRawOf(type);
    if (staticRaw.abstract) {
      node.getNode(CLASS_KEY).setValue(runtime.name);
    }
    const concrete = runtime === staticRaw ? type : runtime.type;
    node.getOptions().mapperFactory.getMapper(concrete).bind(value).serialize(node);
    if (node.isVirtual()) {
      node.setValue({});
    }
  },
};

export const isSerializableType = (type: TypeToken): boolean => {
  const raw = type.getRawType();
  return raw !== undefined && isMappedType(raw);
};
