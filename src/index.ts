import { serializable, serializableInterface } from "./objectmapping/definers";
import { error as errorFn } from "./definers/builders/error";

export { serializable, serializableInterface, errorFn as error };

export {
  ObjectMapper,
  BoundInstance,
} from "./objectmapping/ObjectMapper";
export {
  DefaultObjectMapperFactory,
  type ObjectMapperFactory,
} from "./objectmapping/ObjectMapperFactory";
export { FieldData } from "./objectmapping/FieldData";
export {
  MappedType,
  isMappedType,
  type Constructor,
  type SettingDeclaration,
} from "./objectmapping/MappedType";
export {
  mappedTypeOf,
  findVariant,
  getVariants,
  type SerializableFluentBuilder,
  type SettingOptions,
} from "./objectmapping/definers";

export { TypeToken } from "./tokens/TypeToken";
export { defineRawType, type RawType, type RawTypeOptions } from "./tokens/RawType";
export { SuperTypePredicate } from "./tokens/SuperTypePredicate";
export * from "./tokens/builtins";

export { ConfigurationNode } from "./tree/ConfigurationNode";
export { CommentedConfigurationNode } from "./tree/CommentedConfigurationNode";
export { AbstractConfigurationNode } from "./tree/AbstractConfigurationNode";
export {
  isCommentedNode,
  describePath,
  type ConfigNode,
  type CommentedNode,
  type NodeKey,
} from "./tree/types";
export * as coerce from "./tree/coerce";

export { ConfigurationOptions } from "./config/ConfigurationOptions";
export type { OptionsInput } from "./config/schema";

export type { TypeSerializer } from "./serialize/TypeSerializer";
export {
  TypeSerializerCollection,
  type TypePredicate,
} from "./serialize/TypeSerializerCollection";
export { TypeSerializers } from "./serialize/TypeSerializers";
export { CLASS_KEY } from "./serialize/builtins/serializable";
export { checkUriReference } from "./serialize/builtins/text";

export * from "./errors";
export {
  MapperError,
  isObjectMappingError,
  defineError,
} from "./definers/defineError";
export type {
  IErrorHelper,
  IMapperError,
  DefaultErrorType,
} from "./types/error";

export { Logger, defaultLogger } from "./models/Logger";
export type { ILog, ILogInfo, LoggerOptions, LogLevels } from "./models/Logger";
export { LogPrinter, type PrintStrategy } from "./models/LogPrinter";
