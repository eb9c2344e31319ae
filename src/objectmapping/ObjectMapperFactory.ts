import { defaultLogger, type Logger } from "../models/Logger";
import type { RawType } from "../tokens/RawType";
import { TypeToken } from "../tokens/TypeToken";
import type { MappedType } from "./MappedType";
import { ObjectMapper } from "./ObjectMapper";

/**
 * Source of mappers for the polymorphic serializer and `ObjectMapper.forType`.
 * Implementations return the same mapper for equal types.
 */
export interface ObjectMapperFactory {
  getMapper<T extends object>(
    type: TypeToken<T> | MappedType<T>,
  ): ObjectMapper<T>;
  getMapper(type: TypeToken | MappedType): ObjectMapper<object>;
}

/**
 * Builds each mapper on first request and keeps it for the factory's
 * lifetime.
 */
export class DefaultObjectMapperFactory implements ObjectMapperFactory {
  private static instance: DefaultObjectMapperFactory | undefined;

  // Raw type -> mappers of its parameterizations
  private readonly mappers = new Map<RawType, ObjectMapper<object>[]>();
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger.with({ source: "object-mapper-factory" });
  }

  static getInstance(): DefaultObjectMapperFactory {
    DefaultObjectMapperFactory.instance ??= new DefaultObjectMapperFactory();
    return DefaultObjectMapperFactory.instance;
  }

  getMapper<T extends object>(
    type: TypeToken<T> | MappedType<T>,
  ): ObjectMapper<T>;
  getMapper(type: TypeToken | MappedType): ObjectMapper<object>;
  getMapper(type: TypeToken | MappedType): ObjectMapper<object> {
    const token = type instanceof TypeToken ? type : type.type;
    const raw = token.getRawType();
    const cached = raw
      ? this.mappers.get(raw)?.find((mapper) => mapper.getType().equals(token))
      : undefined;
    if (cached) {
      return cached;
    }

    const mapper = ObjectMapper.create(token);
    const key = mapper.getMappedType();
    this.mappers.set(key, [...(this.mappers.get(key) ?? []), mapper]);
    this.logger.debug(`Created mapper for ${token.toString()}`, {
      data: {
        fields: mapper.getFields().map((field) => field.toString()),
      },
    });
    return mapper;
  }
}
