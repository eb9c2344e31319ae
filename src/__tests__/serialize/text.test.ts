import { ZodError } from "zod";
import { malformedLiteralError, valueAbsentError } from "../../errors";
import { checkUriReference } from "../../serialize/builtins/text";
import { TypeTokens } from "../../tokens/builtins";
import { catchMapperError, decode, encode } from "../fixtures";

const SAMPLE_UUID = "3F2504E0-4F89-41D3-9A0C-0305E82C3301";

describe("UUID serializer", () => {
  it("reads UUIDs in canonical lower-case form", () => {
    expect(decode(TypeTokens.uuid, SAMPLE_UUID)).toBe(
      "3f2504e0-4f89-41d3-9a0c-0305e82c3301",
    );
    expect(encode(TypeTokens.uuid, SAMPLE_UUID)).toBe(
      "3f2504e0-4f89-41d3-9a0c-0305e82c3301",
    );
  });

  it("keeps the validation failure as the cause", () => {
    const error = catchMapperError(() => decode(TypeTokens.uuid, "not-a-uuid"));
    expect(malformedLiteralError.is(error)).toBe(true);
    expect(error.message).toBe(
      "Invalid UUID string provided for value: got not-a-uuid",
    );
    expect(error.cause).toBeInstanceOf(ZodError);
  });

  it("requires a value", () => {
    const error = catchMapperError(() => decode(TypeTokens.uuid, undefined));
    expect(valueAbsentError.is(error)).toBe(true);
  });
});

describe("URI serializer", () => {
  it("accepts absolute and relative references", () => {
    expect(decode(TypeTokens.uri, "urn:isbn:0451450523")).toBe(
      "urn:isbn:0451450523",
    );
    expect(decode(TypeTokens.uri, "../config/main.conf?v=2#top")).toBe(
      "../config/main.conf?v=2#top",
    );
    expect(encode(TypeTokens.uri, "mailto:ops@example.com")).toBe(
      "mailto:ops@example.com",
    );
  });

  it("explains why a reference is malformed", () => {
    expect(checkUriReference("a b")).toBe("illegal character or malformed escape");
    expect(checkUriReference("100%")).toBe("illegal character or malformed escape");
    expect(checkUriReference("x#a#b")).toBe("more than one fragment");
    expect(checkUriReference("1http:x")).toBe('illegal scheme "1http"');
    expect(checkUriReference("http:")).toBe("expected scheme-specific part");
    expect(checkUriReference("path/with:colon")).toBeUndefined();
  });

  it("wraps the problem in a syntax error cause", () => {
    const error = catchMapperError(() => decode(TypeTokens.uri, "has space"));
    expect(error.message).toBe(
      "Invalid URI string provided for value: got has space",
    );
    expect(error.cause).toBeInstanceOf(SyntaxError);
  });
});

describe("URL serializer", () => {
  it("reads URL objects and writes their href", () => {
    const url = decode(TypeTokens.url, "https://example.com/docs");
    expect(url).toBeInstanceOf(URL);
    expect(encode(TypeTokens.url, new URL("https://example.com"))).toBe(
      "https://example.com/",
    );
  });

  it("keeps the URL parser error as the cause", () => {
    const error = catchMapperError(() => decode(TypeTokens.url, "/relative"));
    expect(malformedLiteralError.is(error)).toBe(true);
    expect(error.data).toEqual({ kind: "URL", path: "value", value: "/relative" });
    expect(error.cause).toHaveProperty("name", "TypeError");
    expect(error.cause).toHaveProperty("code", "ERR_INVALID_URL");
  });
});

describe("Pattern serializer", () => {
  it("reads regular expressions and writes their source", () => {
    const pattern = decode(TypeTokens.pattern, "cars?");
    expect(pattern).toEqual(/cars?/);
    expect(encode(TypeTokens.pattern, /^[a-z]+$/)).toBe("^[a-z]+$");
  });

  it("keeps the syntax error as the cause", () => {
    const error = catchMapperError(() => decode(TypeTokens.pattern, "(unclosed"));
    expect(malformedLiteralError.is(error)).toBe(true);
    expect(error.data).toEqual({
      kind: "Pattern",
      path: "value",
      value: "(unclosed",
    });
    expect(error.cause).toBeInstanceOf(SyntaxError);
  });
});
