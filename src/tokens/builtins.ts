/**
 * Raw types and tokens for the value kinds the default serializers handle.
 */

import { defineRawType, type RawType } from "./RawType";
import { TypeToken } from "./TypeToken";

export const StringType = defineRawType<string>("String");
export const BooleanType = defineRawType<boolean>("Boolean");

export const NumberType = defineRawType<number>("Number", { abstract: true });
const numberSupertype = TypeToken.of(NumberType);
export const IntegerType = defineRawType<number>("Integer", {
  supertype: numberSupertype,
});
export const LongType = defineRawType<number>("Long", {
  supertype: numberSupertype,
});
export const ShortType = defineRawType<number>("Short", {
  supertype: numberSupertype,
});
export const ByteType = defineRawType<number>("Byte", {
  supertype: numberSupertype,
});
export const FloatType = defineRawType<number>("Float", {
  supertype: numberSupertype,
});
export const DoubleType = defineRawType<number>("Double", {
  supertype: numberSupertype,
});

export const EnumBaseType = defineRawType<string | number>("Enum", {
  abstract: true,
});

/** UUIDs are kept in their canonical lower-case string form */
export const UUIDType = defineRawType<string>("UUID");
/** URI references are kept as validated strings */
export const URIType = defineRawType<string>("URI");
export const URLType = defineRawType<URL>("URL");
export const PatternType = defineRawType<RegExp>("Pattern");

export const ListType = defineRawType<unknown[]>("List", {
  typeParameters: ["E"],
});
export const MapType = defineRawType<Map<unknown, unknown>>("Map", {
  typeParameters: ["K", "V"],
});

export interface EnumType<E> extends RawType<E> {
  /** Constant name -> value, in declaration order */
  readonly constants: ReadonlyMap<string, E>;
}

// Numeric TypeScript enums carry a reverse mapping ("0" -> "RED"); skip it.
const isReverseMappingKey = (key: string): boolean =>
  String(Number(key)) === key;

/**
 * Declares an enum type from a TypeScript enum object (or any record of
 * constant name to value).
 */
export function enumType<E extends string | number>(
  name: string,
  constants: Readonly<Record<string, E>>,
): EnumType<E> {
  const table = new Map<string, E>();
  for (const [key, value] of Object.entries(constants)) {
    if (isReverseMappingKey(key)) {
      continue;
    }
    table.set(key, value);
  }
  return Object.freeze({
    ...defineRawType<E>(name, {
      supertype: TypeToken.of(EnumBaseType),
    }),
    constants: table,
  });
}

export function isEnumType(raw: RawType): raw is EnumType<unknown> {
  return "constants" in raw && raw.constants instanceof Map;
}

export const TypeTokens = Object.freeze({
  string: TypeToken.of(StringType),
  boolean: TypeToken.of(BooleanType),
  number: TypeToken.of(NumberType),
  int: TypeToken.of(IntegerType),
  long: TypeToken.of(LongType),
  short: TypeToken.of(ShortType),
  byte: TypeToken.of(ByteType),
  float: TypeToken.of(FloatType),
  double: TypeToken.of(DoubleType),
  uuid: TypeToken.of(UUIDType),
  uri: TypeToken.of(URIType),
  url: TypeToken.of(URLType),
  pattern: TypeToken.of(PatternType),

  listOf<E>(element: TypeToken<E>): TypeToken<E[]> {
    return TypeToken.parameterized<E[]>(ListType, element);
  },

  mapOf<K, V>(key: TypeToken<K>, value: TypeToken<V>): TypeToken<Map<K, V>> {
    return TypeToken.parameterized<Map<K, V>>(MapType, key, value);
  },

  enumOf<E>(type: EnumType<E>): TypeToken<E> {
    return TypeToken.of(type);
  },
});
