import type { TypeToken } from "./TypeToken";

/**
 * Effectively `type.isSupertypeOf`, as an object the serializer registry can
 * hold next to predicate registrations.
 */
export class SuperTypePredicate {
  constructor(private readonly type: TypeToken) {}

  test(candidate: TypeToken): boolean {
    return this.type.isSupertypeOf(candidate);
  }

  toString(): string {
    return `supertype of ${this.type.toString()}`;
  }
}
