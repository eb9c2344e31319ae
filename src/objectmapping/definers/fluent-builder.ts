import { TypeToken } from "../../tokens/TypeToken";
import { MappedType } from "../MappedType";
import type { SerializableFluentBuilder } from "./fluent-builder.interface";
import { registerMappedType } from "./registry";
import type { BuilderState, SettingOptions } from "./types";
import { clone } from "./utils";

/**
 * Creates a SerializableFluentBuilder from the given state.
 */
export function makeSerializableBuilder<T extends object>(
  state: BuilderState<T>,
): SerializableFluentBuilder<T> {
  const builder: SerializableFluentBuilder<T> = {
    name: state.name,

    abstract() {
      return makeSerializableBuilder(clone(state, { abstract: true }));
    },

    typeParameters(...names: string[]) {
      return makeSerializableBuilder(clone(state, { typeParameters: names }));
    },

    extends(parent, ...typeArguments) {
      const supertype = TypeToken.of(parent, ...typeArguments);
      return makeSerializableBuilder(clone(state, { supertype }));
    },

    implements(contract, ...typeArguments) {
      const token = TypeToken.of(contract, ...typeArguments);
      return makeSerializableBuilder(
        clone(state, { interfaces: [...state.interfaces, token] }),
      );
    },

    factory(create: () => T) {
      return makeSerializableBuilder(clone(state, { factory: create }));
    },

    setting(field, type, options: SettingOptions = {}) {
      const comment = options.comment ? options.comment : undefined;
      const next = clone(state, {
        settings: [
          ...state.settings,
          { field, type, path: options.path ? options.path : field, comment },
        ],
      });
      return makeSerializableBuilder(next);
    },

    build() {
      const mapped = new MappedType<T>({
        name: state.name,
        abstract: state.abstract,
        typeParameters: state.typeParameters,
        supertype: state.supertype,
        interfaces: state.interfaces,
        ctor: state.ctor,
        factory: state.factory,
        settings: state.settings,
      });
      registerMappedType(mapped);
      return mapped;
    },
  };

  return builder;
}
