import type { TypeToken } from "../../tokens/TypeToken";
import type { Constructor, SettingDeclaration } from "../MappedType";

export interface SettingOptions {
  /** Wire key to use instead of the field name; empty means the field name */
  path?: string;
  /** Attached to the node on commented trees; empty means none */
  comment?: string;
}

/**
 * Internal state for the SerializableFluentBuilder.
 * Kept immutable and frozen.
 */
export type BuilderState<T extends object> = Readonly<{
  name: string;
  ctor?: Constructor<T>;
  abstract: boolean;
  typeParameters: readonly string[];
  supertype?: TypeToken;
  interfaces: readonly TypeToken[];
  factory?: () => T;
  settings: readonly SettingDeclaration[];
}>;
