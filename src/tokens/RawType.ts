import type { TypeToken } from "./TypeToken";

/**
 * Runtime description of a (possibly generic) type: the part of a type that
 * does not depend on type arguments. Identity is by reference.
 */
export interface RawType<T = unknown> {
  /** Canonical name. Also the discriminator written for polymorphic values. */
  readonly name: string;
  /** Abstract classes and interfaces cannot be instantiated by a mapper */
  readonly abstract: boolean;
  readonly typeParameters: readonly string[];
  /** Direct superclass, expressed in terms of this type's parameters */
  readonly supertype?: TypeToken;
  readonly interfaces: readonly TypeToken[];
  /** Phantom marker carrying the instance type; never set at runtime */
  readonly __instance?: T;
}

export interface RawTypeOptions {
  abstract?: boolean;
  typeParameters?: readonly string[];
  supertype?: TypeToken;
  interfaces?: readonly TypeToken[];
}

export function defineRawType<T>(
  name: string,
  options: RawTypeOptions = {},
): RawType<T> {
  return Object.freeze({
    name,
    abstract: options.abstract ?? false,
    typeParameters: Object.freeze([...(options.typeParameters ?? [])]),
    supertype: options.supertype,
    interfaces: Object.freeze([...(options.interfaces ?? [])]),
  });
}
