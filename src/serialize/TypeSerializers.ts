import { TypeToken } from "../tokens/TypeToken";
import {
  BooleanType,
  EnumBaseType,
  ListType,
  MapType,
  NumberType,
  PatternType,
  StringType,
  URIType,
  URLType,
  UUIDType,
} from "../tokens/builtins";
import {
  listSerializer,
  mapSerializer,
} from "./builtins/containers";
import { enumSerializer } from "./builtins/enum";
import {
  booleanSerializer,
  numberSerializer,
  stringSerializer,
} from "./builtins/scalars";
import {
  isSerializableType,
  serializableSerializer,
} from "./builtins/serializable";
import {
  patternSerializer,
  uriSerializer,
  urlSerializer,
  uuidSerializer,
} from "./builtins/text";
import { TypeSerializerCollection } from "./TypeSerializerCollection";

let defaults: TypeSerializerCollection | undefined;

const createDefaults = (): TypeSerializerCollection =>
  new TypeSerializerCollection()
    .registerType(TypeToken.of(URIType), uriSerializer)
    .registerType(TypeToken.of(URLType), urlSerializer)
    .registerType(TypeToken.of(UUIDType), uuidSerializer)
    .registerPredicate(isSerializableType, serializableSerializer)
    .registerType(TypeToken.of(NumberType), numberSerializer)
    .registerType(TypeToken.of(StringType), stringSerializer)
    .registerType(TypeToken.of(BooleanType), booleanSerializer)
    .registerType(TypeToken.of(MapType), mapSerializer)
    .registerType(TypeToken.of(ListType), listSerializer)
    .registerType(TypeToken.of(EnumBaseType), enumSerializer)
    .registerType(TypeToken.of(PatternType), patternSerializer);

export const TypeSerializers = Object.freeze({
  /**
   * The shared collection holding every built-in serializer. Register custom
   * serializers on a child (`newChild()`) rather than on this instance.
   */
  getDefaultSerializers(): TypeSerializerCollection {
    defaults ??= createDefaults();
    return defaults;
  },

  newCollection(): TypeSerializerCollection {
    return TypeSerializers.getDefaultSerializers().newChild();
  },
});
