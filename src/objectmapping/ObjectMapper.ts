import {
  abstractTypeError,
  constructionError,
  noFactoryError,
  notMappableTypeError,
  unmappedRuntimeTypeError,
} from "../errors";
import type { TypeToken } from "../tokens/TypeToken";
import type { RawType } from "../tokens/RawType";
import type { ConfigNode } from "../tree/types";
import { FieldData } from "./FieldData";
import { isMappedType, type MappedType } from "./MappedType";
import { mappedTypeOf } from "./definers/registry";
import { DefaultObjectMapperFactory } from "./ObjectMapperFactory";

/**
 * Settings of `token` and its ancestors, keyed by wire path. The most derived
 * declaration of a path wins; interfaces come after the class chain.
 */
const collectFields = (token: TypeToken): Map<string, FieldData> => {
  const fields = new Map<string, FieldData>();
  const visited = new Set<RawType>();

  const addSettings = (owner: TypeToken) => {
    const raw = owner.getRawType();
    if (!raw || !isMappedType(raw)) {
      return;
    }
    for (const setting of raw.settings) {
      if (!fields.has(setting.path)) {
        fields.set(
          setting.path,
          new FieldData(
            setting.field,
            owner.resolveType(setting.type),
            setting.path,
            setting.comment,
          ),
        );
      }
    }
  };

  const chain: TypeToken[] = [];
  let current: TypeToken | undefined = token;
  while (current) {
    const raw = current.getRawType();
    if (!raw || visited.has(raw)) {
      break;
    }
    visited.add(raw);
    chain.push(current);
    current = raw.supertype ? current.resolveType(raw.supertype) : undefined;
  }
  chain.forEach(addSettings);

  const visitInterfaces = (owner: TypeToken) => {
    for (const contract of owner.getRawType()?.interfaces ?? []) {
      const resolved = owner.resolveType(contract);
      const raw = resolved.getRawType();
      if (!raw || visited.has(raw)) {
        continue;
      }
      visited.add(raw);
      addSettings(resolved);
      visitInterfaces(resolved);
    }
  };
  chain.forEach(visitInterfaces);

  return fields;
};

/**
 * Maps one record type to and from nodes. Built once per type through an
 * `ObjectMapperFactory`; use `bind()`/`bindToNew()` for each operation.
 */
export class ObjectMapper<T extends object> {
  private readonly fields: ReadonlyMap<string, FieldData>;

  private constructor(
    private readonly type: TypeToken,
    private readonly mappedType: MappedType<T>,
  ) {
    this.fields = collectFields(type);
  }

  /**
   * Builds a mapper for `type`. Fails unless the type is a concrete
   * `serializable()` declaration.
   */
  static create(type: TypeToken): ObjectMapper<object> {
    const raw = type.getRawType();
    if (!raw || !isMappedType(raw)) {
      throw notMappableTypeError.create({ type: type.toString() });
    }
    if (raw.abstract) {
      throw abstractTypeError.create({ type: type.toString() });
    }
    return new ObjectMapper(type, raw);
  }

  static forType<T extends object>(
    type: TypeToken<T> | MappedType<T>,
  ): ObjectMapper<T>;
  static forType(type: TypeToken | MappedType): ObjectMapper<object>;
  static forType(type: TypeToken | MappedType): ObjectMapper<object> {
    return DefaultObjectMapperFactory.getInstance().getMapper(type);
  }

  static forClass<T extends object>(mapped: MappedType<T>): ObjectMapper<T> {
    return ObjectMapper.forType(mapped);
  }

  /**
   * Binds `instance` to the mapper of its runtime class.
   */
  static forObject<T extends object>(instance: T): BoundInstance<T> {
    const mapped = mappedTypeOf(instance);
    if (!mapped) {
      throw unmappedRuntimeTypeError.create({
        className: instance.constructor.name,
      });
    }
    return new BoundInstance(ObjectMapper.forType(mapped.type), instance);
  }

  getType(): TypeToken {
    return this.type;
  }

  getMappedType(): MappedType<T> {
    return this.mappedType;
  }

  /** Descriptors in discovery order */
  getFields(): readonly FieldData[] {
    return Array.from(this.fields.values());
  }

  canCreateInstances(): boolean {
    return this.mappedType.factory !== undefined;
  }

  bind(instance: T): BoundInstance<T> {
    return new BoundInstance(this, instance);
  }

  bindToNew(): BoundInstance<T> {
    const { factory } = this.mappedType;
    if (!factory) {
      throw noFactoryError.create({ type: this.type.toString() });
    }
    let instance: T;
    try {
      instance = factory();
    } catch (error) {
      throw constructionError.create({ type: this.type.toString() }, error);
    }
    return this.bind(instance);
  }

  toString(): string {
    return `ObjectMapper<${this.type.toString()}>`;
  }
}

/**
 * A mapper paired with one record. Failures leave the fields already
 * processed as they are.
 */
export class BoundInstance<T extends object> {
  constructor(
    private readonly mapper: ObjectMapper<object>,
    private readonly instance: T,
  ) {}

  /**
   * Reads every field from `source`. A virtual `source` is materialized as an
   * empty map when nothing was written to it.
   */
  populate(source: ConfigNode): T {
    const wasVirtual = source.isVirtual();
    for (const field of this.mapper.getFields()) {
      field.deserializeFrom(this.instance, source.getNode(field.path));
    }
    if (wasVirtual && source.isVirtual()) {
      source.setValue({});
    }
    return this.instance;
  }

  serialize(target: ConfigNode): void {
    for (const field of this.mapper.getFields()) {
      field.serializeTo(this.instance, target.getNode(field.path));
    }
  }

  getInstance(): T {
    return this.instance;
  }
}
