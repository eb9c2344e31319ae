import { invalidValueError } from "../../errors";
import { TypeTokens } from "../../tokens/builtins";
import { catchMapperError, decode, encode } from "../fixtures";

describe("string serializer", () => {
  it("passes strings through and stringifies other scalars", () => {
    expect(decode(TypeTokens.string, "hello")).toBe("hello");
    expect(decode(TypeTokens.string, 12)).toBe("12");
    expect(decode(TypeTokens.string, true)).toBe("true");
    expect(decode(TypeTokens.string, undefined)).toBeUndefined();
    expect(encode(TypeTokens.string, "hello")).toBe("hello");
  });
});

describe("boolean serializer", () => {
  it("accepts booleans, numbers and yes/no words", () => {
    expect(decode(TypeTokens.boolean, false)).toBe(false);
    expect(decode(TypeTokens.boolean, "y")).toBe(true);
    expect(decode(TypeTokens.boolean, "F")).toBe(false);
    expect(decode(TypeTokens.boolean, 2)).toBe(true);
    expect(decode(TypeTokens.boolean, undefined)).toBeUndefined();
    expect(encode(TypeTokens.boolean, true)).toBe(true);
  });

  it("fails on text that is not a boolean", () => {
    const error = catchMapperError(() => decode(TypeTokens.boolean, "maybe"));
    expect(invalidValueError.is(error)).toBe(true);
    expect(error.data).toEqual({
      path: "value",
      type: "Boolean",
      value: '"maybe"',
    });
    expect(error.message).toBe(
      'Invalid value provided for value: expected a value of type Boolean, got "maybe"',
    );
  });
});

describe("number serializer", () => {
  it("reads with the precision of the declared kind", () => {
    expect(decode(TypeTokens.int, "12")).toBe(12);
    expect(decode(TypeTokens.int, 7.9)).toBe(7);
    expect(decode(TypeTokens.long, 5000000000.5)).toBe(5000000000);
    expect(decode(TypeTokens.double, "2.25")).toBe(2.25);
    expect(decode(TypeTokens.float, 0.1)).toBe(Math.fround(0.1));
    expect(decode(TypeTokens.number, 0.1)).toBe(0.1);
  });

  it("narrows short and byte values from an int read", () => {
    expect(decode(TypeTokens.short, 40000)).toBe(-25536);
    expect(decode(TypeTokens.byte, 200)).toBe(-56);
    expect(decode(TypeTokens.byte, 100)).toBe(100);
  });

  it("returns nothing for an absent value", () => {
    expect(decode(TypeTokens.int, undefined)).toBeUndefined();
  });

  it("fails on values that are not numbers", () => {
    const error = catchMapperError(() => decode(TypeTokens.int, "twelve"));
    expect(invalidValueError.is(error)).toBe(true);
    expect(error.data).toEqual({
      path: "value",
      type: "Integer",
      value: '"twelve"',
    });
    const listError = catchMapperError(() => decode(TypeTokens.double, [1]));
    expect(listError.data).toEqual({
      path: "value",
      type: "Double",
      value: "[1]",
    });
  });

  it("writes the number as given", () => {
    expect(encode(TypeTokens.int, 3)).toBe(3);
    expect(encode(TypeTokens.double, 1.25)).toBe(1.25);
  });
});
