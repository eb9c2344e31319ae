import type { RawType } from "../tokens/RawType";
import { TypeToken } from "../tokens/TypeToken";
import { symbolSerializable } from "../types/symbols";

export type Constructor<T> = abstract new (...args: never[]) => T;

/**
 * One declared setting: a record field, the type it holds and where it lives
 * in the tree.
 */
export interface SettingDeclaration {
  readonly field: string;
  readonly type: TypeToken;
  /** Wire key; the field name when not overridden */
  readonly path: string;
  readonly comment?: string;
}

export interface MappedTypeDefinition<T extends object> {
  readonly name: string;
  readonly abstract: boolean;
  readonly typeParameters: readonly string[];
  readonly supertype?: TypeToken;
  readonly interfaces: readonly TypeToken[];
  readonly ctor?: Constructor<T>;
  readonly factory?: () => T;
  readonly settings: readonly SettingDeclaration[];
}

/**
 * A record type declared with `serializable()`: a raw type that also knows
 * its settings and how to construct instances.
 */
export class MappedType<T extends object = object> implements RawType<T> {
  declare readonly __instance?: T;
  readonly [symbolSerializable] = true as const;

  readonly name: string;
  readonly abstract: boolean;
  readonly typeParameters: readonly string[];
  readonly supertype?: TypeToken;
  readonly interfaces: readonly TypeToken[];
  readonly ctor?: Constructor<T>;
  /** Present exactly when mappers may create instances */
  readonly factory?: () => T;
  /** Settings declared on this type only, in declaration order */
  readonly settings: readonly SettingDeclaration[];
  /** The raw token for this type */
  readonly type: TypeToken<T>;

  constructor(definition: MappedTypeDefinition<T>) {
    this.name = definition.name;
    this.abstract = definition.abstract;
    this.typeParameters = Object.freeze([...definition.typeParameters]);
    this.supertype = definition.supertype;
    this.interfaces = Object.freeze([...definition.interfaces]);
    this.ctor = definition.ctor;
    this.factory = definition.factory;
    this.settings = Object.freeze(
      definition.settings.map((setting) => Object.freeze({ ...setting })),
    );
    this.type = TypeToken.of<T>(this);
    Object.freeze(this);
  }

  toString(): string {
    return this.name;
  }
}

export function isMappedType(raw: RawType): raw is MappedType {
  return symbolSerializable in raw;
}
