import { typeArityError } from "../errors";
import type { RawType } from "./RawType";

type TokenForm =
  | { kind: "class"; raw: RawType; parameters: readonly TypeToken[] }
  | { kind: "variable"; name: string }
  | { kind: "wildcard" };

/**
 * A type with its generic arguments, kept at runtime.
 *
 * Three shapes exist: a class token (`List<String>`), a type variable (`T`,
 * only meaningful inside a generic declaration) and the wildcard (`?`).
 * A class token without parameters stands for the raw type and matches every
 * parameterization of it.
 */
export class TypeToken<T = unknown> {
  declare readonly __instance?: T;

  private static readonly WILDCARD = new TypeToken<unknown>({
    kind: "wildcard",
  });

  private constructor(private readonly form: TokenForm) {}

  static of<T>(raw: RawType<T>, ...parameters: TypeToken[]): TypeToken<T> {
    return TypeToken.parameterized<T>(raw, ...parameters);
  }

  /**
   * Like `of()`, for raw types whose instance type depends on the arguments
   * (`List`, `Map`, generic records). `T` is the resulting instance type.
   */
  static parameterized<T>(
    raw: RawType,
    ...parameters: TypeToken[]
  ): TypeToken<T> {
    if (
      parameters.length !== 0 &&
      parameters.length !== raw.typeParameters.length
    ) {
      typeArityError.throw({
        type: raw.name,
        expected: raw.typeParameters.length,
        actual: parameters.length,
      });
    }
    return new TypeToken<T>({ kind: "class", raw, parameters });
  }

  static variable(name: string): TypeToken<unknown> {
    return new TypeToken<unknown>({ kind: "variable", name });
  }

  static wildcard(): TypeToken<unknown> {
    return TypeToken.WILDCARD;
  }

  getRawType(): RawType | undefined {
    return this.form.kind === "class" ? this.form.raw : undefined;
  }

  getParameters(): readonly TypeToken[] {
    return this.form.kind === "class" ? this.form.parameters : [];
  }

  /**
   * The type argument at `index`, or the wildcard when the token is raw.
   */
  getParameter(index: number): TypeToken {
    return this.getParameters()[index] ?? TypeToken.WILDCARD;
  }

  isWildcard(): boolean {
    return this.form.kind === "wildcard";
  }

  isVariable(): boolean {
    return this.form.kind === "variable";
  }

  isAbstract(): boolean {
    return this.form.kind === "class" && this.form.raw.abstract;
  }

  /**
   * Substitutes this token's type arguments for the type variables that
   * appear in `expression`. Variables this token does not bind are kept.
   */
  resolveType(expression: TypeToken): TypeToken {
    const bindings = this.bindings();
    if (bindings.size === 0) {
      return expression;
    }
    return expression.substitute(bindings);
  }

  /**
   * The parameterization of `target` this type extends or implements,
   * resolved against this token's arguments.
   */
  getSupertype(target: RawType): TypeToken | undefined {
    if (this.form.kind !== "class") {
      return undefined;
    }
    if (this.form.raw === target) {
      return this;
    }
    const { supertype, interfaces } = this.form.raw;
    const candidates = supertype ? [supertype, ...interfaces] : interfaces;
    for (const candidate of candidates) {
      const found = this.resolveType(candidate).getSupertype(target);
      if (found) {
        return found;
      }
    }
    return undefined;
  }

  isSupertypeOf(other: TypeToken): boolean {
    const form = this.form;
    if (form.kind === "wildcard") {
      return true;
    }
    if (form.kind === "variable") {
      return this.equals(other);
    }
    const ancestor = other.getSupertype(form.raw);
    if (!ancestor) {
      return false;
    }
    if (form.parameters.length === 0) {
      return true;
    }
    const actual = ancestor.getParameters();
    return form.parameters.every((parameter, index) => {
      if (parameter.isWildcard()) {
        return true;
      }
      const argument = actual[index];
      return argument !== undefined && parameter.equals(argument);
    });
  }

  equals(other: TypeToken): boolean {
    if (this === other) {
      return true;
    }
    const a = this.form;
    const b = other.form;
    if (a.kind === "wildcard" || b.kind === "wildcard") {
      return a.kind === b.kind;
    }
    if (a.kind === "variable" || b.kind === "variable") {
      return a.kind === "variable" && b.kind === "variable" && a.name === b.name;
    }
    return (
      a.raw === b.raw &&
      a.parameters.length === b.parameters.length &&
      a.parameters.every((parameter, index) =>
        parameter.equals(b.parameters[index]),
      )
    );
  }

  toString(): string {
    switch (this.form.kind) {
      case "wildcard":
        return "?";
      case "variable":
        return this.form.name;
      case "class": {
        const { raw, parameters } = this.form;
        if (parameters.length === 0) {
          return raw.name;
        }
        return `${raw.name}<${parameters.map(String).join(", ")}>`;
      }
    }
  }

  private bindings(): Map<string, TypeToken> {
    const bindings = new Map<string, TypeToken>();
    if (this.form.kind === "class") {
      const { raw, parameters } = this.form;
      parameters.forEach((parameter, index) => {
        bindings.set(raw.typeParameters[index], parameter);
      });
    }
    return bindings;
  }

  private substitute(bindings: ReadonlyMap<string, TypeToken>): TypeToken {
    switch (this.form.kind) {
      case "wildcard":
        return this;
      case "variable":
        return bindings.get(this.form.name) ?? this;
      case "class": {
        const { raw, parameters } = this.form;
        if (parameters.length === 0) {
          return this;
        }
        return new TypeToken({
          kind: "class",
          raw,
          parameters: parameters.map((parameter) =>
            parameter.substitute(bindings),
          ),
        });
      }
    }
  }
}
