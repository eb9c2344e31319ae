/**
 * Serializers for strings, booleans and the number family.
 */

import { invalidValueError } from "../../errors";
import {
  ByteType,
  DoubleType,
  FloatType,
  IntegerType,
  LongType,
  ShortType,
} from "../../tokens/builtins";
import type { TypeToken } from "../../tokens/TypeToken";
import { toByte, toShort } from "../../tree/coerce";
import { describePath, type ConfigNode } from "../../tree/types";
import type { TypeSerializer } from "../TypeSerializer";

const invalidValue = (type: TypeToken, node: ConfigNode) =>
  invalidValueError.create({
    path: describePath(node),
    type: type.toString(),
    value: JSON.stringify(node.getValue()),
  });

export const stringSerializer: TypeSerializer<string> = {
  deserialize: (_type, node) => node.getString(),
  serialize: (_type, value, node) => {
    node.setValue(value);
  },
};

/**
 * Accepts booleans, numbers and the usual words for yes/no.
 */
export const booleanSerializer: TypeSerializer<boolean> = {
  deserialize: (type, node) => {
    const value = node.getBoolean();
    if (value === undefined && node.getValue() !== undefined) {
      throw invalidValue(type, node);
    }
    return value;
  },
  serialize: (_type, value, node) => {
    node.setValue(value);
  },
};

const readNumber = (type: TypeToken, node: ConfigNode): number | undefined => {
  switch (type.getRawType()) {
    case IntegerType:
      return node.getInt();
    case LongType:
      return node.getLong();
    case ShortType: {
      const value = node.getInt();
      return value === undefined ? undefined : toShort(value);
    }
    case ByteType: {
      const value = node.getInt();
      return value === undefined ? undefined : toByte(value);
    }
    case FloatType:
      return node.getFloat();
    case DoubleType:
    default:
      return node.getDouble();
  }
};

/**
 * Reads with the precision of the declared kind. Short and byte values are
 * narrowed from an int read, wrapping on overflow.
 */
export const numberSerializer: TypeSerializer<number> = {
  deserialize: (type, node) => {
    const value = readNumber(type, node);
    if (value === undefined && node.getValue() !== undefined) {
      throw invalidValue(type, node);
    }
    return value;
  },
  serialize: (_type, value, node) => {
    node.setValue(value);
  },
};
