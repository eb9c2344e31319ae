import type { Constructor } from "../MappedType";
import { makeSerializableBuilder } from "./fluent-builder";
import type { SerializableFluentBuilder } from "./fluent-builder.interface";
import type { BuilderState } from "./types";

export * from "./fluent-builder.interface";
export * from "./fluent-builder";
export * from "./registry";
export * from "./types";

const initialState = <T extends object>(
  name: string,
  ctor?: Constructor<T>,
): BuilderState<T> =>
  Object.freeze({
    name,
    ctor,
    abstract: false,
    typeParameters: [],
    interfaces: [],
    settings: [],
  });

/**
 * Entry point for declaring a mapped class. The name defaults to the class
 * name and is what `__class__` holds for polymorphic values.
 */
export function serializable<T extends object>(
  ctor: Constructor<T>,
  name: string = ctor.name,
): SerializableFluentBuilder<T> {
  return makeSerializableBuilder(initialState(name, ctor));
}

/**
 * Declares a mapped interface: always abstract, with no runtime class.
 */
export function serializableInterface<T extends object>(
  name: string,
): SerializableFluentBuilder<T> {
  return makeSerializableBuilder(
    Object.freeze({ ...initialState<T>(name), abstract: true }),
  );
}
