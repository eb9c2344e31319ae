import { SuperTypePredicate } from "../tokens/SuperTypePredicate";
import type { TypeToken } from "../tokens/TypeToken";
import type { TypeSerializer } from "./TypeSerializer";

export type TypePredicate = (type: TypeToken) => boolean;

interface Registration {
  readonly test: TypePredicate;
  readonly serializer: TypeSerializer<unknown>;
}

/**
 * Ordered serializer lookup. The first registration whose predicate accepts
 * a type wins; types nobody here accepts are looked up in the parent.
 */
export class TypeSerializerCollection {
  private readonly registrations: Registration[] = [];

  constructor(private readonly parent?: TypeSerializerCollection) {}

  /**
   * Serves `type` and every subtype of it. A raw token (no arguments) also
   * serves every parameterization.
   */
  registerType<T>(type: TypeToken<T>, serializer: TypeSerializer<T>): this {
    const predicate = new SuperTypePredicate(type);
    return this.registerPredicate((candidate) => predicate.test(candidate), serializer);
  }

  registerPredicate<T>(test: TypePredicate, serializer: TypeSerializer<T>): this {
    this.registrations.push({ test, serializer });
    return this;
  }

  get(type: TypeToken): TypeSerializer<unknown> | undefined {
    for (const registration of this.registrations) {
      if (registration.test(type)) {
        return registration.serializer;
      }
    }
    return this.parent?.get(type);
  }

  getParent(): TypeSerializerCollection | undefined {
    return this.parent;
  }

  /** An empty collection that falls back to this one */
  newChild(): TypeSerializerCollection {
    return new TypeSerializerCollection(this);
  }
}
