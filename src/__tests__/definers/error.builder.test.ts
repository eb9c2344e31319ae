import { error } from "../../definers/builders/error";
import { isObjectMappingError, MapperError } from "../../definers/defineError";
import { invalidOptionsError, valueAbsentError } from "../../errors";

describe("error builder", () => {
  it("build() returns an ErrorHelper that can throw and type-narrow via is()", () => {
    const AppError = error<{ code: number }>("tests.errors.app")
      .format(({ code }) => `Failed with ${code}`)
      .build();

    try {
      AppError.throw({ code: 123 });
      throw new Error("Expected throw to raise");
    } catch (err) {
      expect(AppError.is(err)).toBe(true);
      if (AppError.is(err)) {
        expect(err.name).toBe("tests.errors.app");
        expect(err.message).toBe("Failed with 123");
        expect(err.data).toEqual({ code: 123 });
      }
    }
  });

  it("falls back to the id when no formatter is given", () => {
    const Bare = error("tests.errors.bare").build();

    expect(Bare.create({}).message).toBe("tests.errors.bare");
  });

  it("appends remediation advice, static or computed", () => {
    const Static = error<{ key: string }>("tests.errors.static")
      .format(({ key }) => `Missing ${key}`)
      .remediation("Add it.")
      .build();
    const Computed = error<{ key: string }>("tests.errors.computed")
      .format(({ key }) => `Missing ${key}`)
      .remediation(({ key }) => `Add ${key} to the file.`)
      .build();

    expect(Static.create({ key: "port" }).message).toBe(
      "Missing port\n\nRemediation: Add it.",
    );
    expect(Computed.create({ key: "port" }).message).toBe(
      "Missing port\n\nRemediation: Add port to the file.",
    );
  });

  it("keeps the underlying failure as the cause", () => {
    const cause = new TypeError("bad");
    const created = valueAbsentError.create({ path: "a.b" }, cause);

    expect(created.cause).toBe(cause);
    expect(created.message).toBe("No value present in node a.b");
  });

  it("is() only matches its own id", () => {
    const created = valueAbsentError.create({ path: "a" });

    expect(valueAbsentError.is(created)).toBe(true);
    expect(invalidOptionsError.is(created)).toBe(false);
    expect(valueAbsentError.is(new Error("plain"))).toBe(false);
  });

  it("marks every mapper error as an object mapping error", () => {
    const created = invalidOptionsError.create({ issues: ["a: bad", "b: bad"] });

    expect(created).toBeInstanceOf(MapperError);
    expect(isObjectMappingError(created)).toBe(true);
    expect(isObjectMappingError(new Error("plain"))).toBe(false);
    expect(created.message).toBe(
      "Invalid configuration options:\n  • a: bad\n  • b: bad",
    );
  });

  it("freezes built helpers", () => {
    const Frozen = error("tests.errors.frozen").build();

    expect(Object.isFrozen(Frozen)).toBe(true);
  });
});
