import { invalidEnumConstantError, valueAbsentError } from "../../errors";
import { isEnumType, type EnumType } from "../../tokens/builtins";
import type { TypeToken } from "../../tokens/TypeToken";
import { describePath } from "../../tree/types";
import type { TypeSerializer } from "../TypeSerializer";

const enumOf = (type: TypeToken): EnumType<unknown> | undefined => {
  const raw = type.getRawType();
  return raw && isEnumType(raw) ? raw : undefined;
};

const findConstant = (
  type: EnumType<unknown>,
  name: string,
): { found: true; value: unknown } | { found: false } => {
  for (const [constant, value] of type.constants) {
    if (constant === name) {
      return { found: true, value };
    }
  }
  return { found: false };
};

/**
 * Uppercases the input before matching it against the declared constant
 * names. Writes names as declared.
 */
export const enumSerializer: TypeSerializer<unknown> = {
  deserialize: (type, node) => {
    const text = node.getString();
    if (text === undefined) {
      throw valueAbsentError.create({ path: describePath(node) });
    }
    const name = text.toUpperCase();
    const enumType = enumOf(type);
    const match = enumType && findConstant(enumType, name);
    if (!match || !match.found) {
      throw invalidEnumConstantError.create({
        path: describePath(node),
        type: type.toString(),
        value: name,
      });
    }
    return match.value;
  },
  serialize: (type, value, node) => {
    for (const [constant, candidate] of enumOf(type)?.constants ?? []) {
      if (candidate === value) {
        node.setValue(constant);
        return;
      }
    }
    throw invalidEnumConstantError.create({
      path: describePath(node),
      type: type.toString(),
      value: String(value),
    });
  },
};
