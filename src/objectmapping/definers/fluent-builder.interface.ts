import type { TypeToken } from "../../tokens/TypeToken";
import type { MappedType } from "../MappedType";
import type { SettingOptions } from "./types";

export interface SerializableFluentBuilder<T extends object> {
  name: string;
  build(): MappedType<T>;
  /** Mappers refuse abstract types; values of them round-trip through `__class__` */
  abstract(): SerializableFluentBuilder<T>;
  typeParameters(...names: string[]): SerializableFluentBuilder<T>;
  /**
   * Inherit the parent's settings. `typeArguments` bind the parent's type
   * parameters, and may themselves be this type's variables.
   */
  extends<P extends object>(
    parent: MappedType<P>,
    ...typeArguments: TypeToken[]
  ): SerializableFluentBuilder<T>;
  implements<I extends object>(
    contract: MappedType<I>,
    ...typeArguments: TypeToken[]
  ): SerializableFluentBuilder<T>;
  /** Zero-argument constructor; without one, mappers only bind existing instances */
  factory(create: () => T): SerializableFluentBuilder<T>;
  setting<K extends keyof T & string>(
    field: K,
    type: TypeToken<T[K]>,
    options?: SettingOptions,
  ): SerializableFluentBuilder<T>;
}
