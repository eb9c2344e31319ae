import { duplicateVariantError } from "../../errors";
import type { RawType } from "../../tokens/RawType";
import type { TypeToken } from "../../tokens/TypeToken";
import type { MappedType } from "../MappedType";

// Abstract type -> variant name -> concrete or abstract subtype
const variantTables = new WeakMap<RawType, Map<string, MappedType>>();
// Class constructor -> its declaration
const declarations = new WeakMap<object, MappedType>();

const ancestorsOf = (type: RawType): Set<RawType> => {
  const found = new Set<RawType>();
  const visit = (token: TypeToken | undefined) => {
    const raw = token?.getRawType();
    if (!raw || found.has(raw)) {
      return;
    }
    found.add(raw);
    visit(raw.supertype);
    raw.interfaces.forEach(visit);
  };
  visit(type.supertype);
  type.interfaces.forEach(visit);
  return found;
};

/**
 * Makes `mapped` resolvable by name from every abstract ancestor and by
 * constructor from its instances.
 */
export function registerMappedType(mapped: MappedType): void {
  const ancestors = Array.from(ancestorsOf(mapped)).filter(
    (ancestor) => ancestor.abstract,
  );
  for (const ancestor of ancestors) {
    const existing = variantTables.get(ancestor)?.get(mapped.name);
    if (existing && existing !== mapped) {
      throw duplicateVariantError.create({
        name: mapped.name,
        type: ancestor.name,
      });
    }
  }
  for (const ancestor of ancestors) {
    let table = variantTables.get(ancestor);
    if (!table) {
      table = new Map();
      variantTables.set(ancestor, table);
    }
    table.set(mapped.name, mapped);
  }
  if (mapped.ctor) {
    declarations.set(mapped.ctor, mapped);
  }
}

/** The subtype of `base` registered under `name` */
export function findVariant(
  base: RawType,
  name: string,
): MappedType | undefined {
  return variantTables.get(base)?.get(name);
}

export function getVariants(base: RawType): ReadonlyMap<string, MappedType> {
  return new Map(variantTables.get(base));
}

/**
 * The declaration for an instance's class, or for the nearest declared class
 * up its prototype chain.
 */
export function mappedTypeOf(instance: object): MappedType | undefined {
  let prototype: unknown = Object.getPrototypeOf(instance);
  while (typeof prototype === "object" && prototype !== null) {
    const ctor: unknown = Reflect.get(prototype, "constructor");
    if (typeof ctor === "function") {
      const mapped = declarations.get(ctor);
      if (mapped) {
        return mapped;
      }
    }
    prototype = Object.getPrototypeOf(prototype);
  }
  return undefined;
}
