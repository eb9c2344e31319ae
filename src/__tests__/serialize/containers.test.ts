import { invalidMapKeyError, noSerializerError } from "../../errors";
import { ConfigurationOptions } from "../../config/ConfigurationOptions";
import type { TypeSerializer } from "../../serialize/TypeSerializer";
import { defineRawType } from "../../tokens/RawType";
import { TypeToken } from "../../tokens/TypeToken";
import { ListType, TypeTokens } from "../../tokens/builtins";
import { ConfigurationNode } from "../../tree/ConfigurationNode";
import { catchMapperError, decode, encode } from "../fixtures";

const listOfInts = TypeTokens.listOf(TypeTokens.int);
const mapOfInts = TypeTokens.mapOf(TypeTokens.string, TypeTokens.int);

describe("list serializer", () => {
  it("reads list children in order", () => {
    expect(decode(listOfInts, [3, "1", 2])).toEqual([3, 1, 2]);
  });

  it("wraps a lone scalar in a one-element list", () => {
    expect(decode(listOfInts, 5)).toEqual([5]);
  });

  it("reads an absent value as an empty list", () => {
    expect(decode(listOfInts, undefined)).toEqual([]);
  });

  it("replaces existing children on write", () => {
    const root = ConfigurationNode.root().setValue({ value: [9, 9, 9, 9] });
    const serializer = root.getOptions().serializers.get(listOfInts);
    serializer?.serialize(listOfInts, [1, 2], root.getNode("value"));
    expect(root.getValue()).toEqual({ value: [1, 2] });
  });

  it("writes an empty list explicitly", () => {
    expect(encode(listOfInts, [])).toEqual([]);
  });

  it("reads nested containers", () => {
    const nested = TypeTokens.listOf(TypeTokens.listOf(TypeTokens.string));
    expect(decode(nested, [["a"], "b", []])).toEqual([["a"], ["b"], []]);
    expect(encode(nested, [["x", "y"], []])).toEqual([["x", "y"], []]);
  });

  it("resolves the element type of list subtypes", () => {
    const Tags = defineRawType<string[]>("Tags", {
      supertype: TypeToken.of(ListType, TypeTokens.string),
    });
    expect(decode(TypeToken.of(Tags), ["a", 1])).toEqual(["a", "1"]);
  });

  it("fails when the element type has no serializer", () => {
    const Opaque = defineRawType("Opaque");
    const type = TypeTokens.listOf(TypeToken.of(Opaque));
    const error = catchMapperError(() => decode(type, [1]));
    expect(noSerializerError.is(error)).toBe(true);
    expect(error.message).toBe(
      "No TypeSerializer found for type Opaque\n\nRemediation: Register a serializer for Opaque on the collection passed to ConfigurationOptions.withSerializers().",
    );
  });
});

describe("map serializer", () => {
  it("keeps source order", () => {
    const value = decode(mapOfInts, { zeta: 1, alpha: "2", mid: 3 });
    expect(value).toBeInstanceOf(Map);
    expect(Array.from(value instanceof Map ? value : [])).toEqual([
      ["zeta", 1],
      ["alpha", 2],
      ["mid", 3],
    ]);
  });

  it("decodes keys through the key serializer", () => {
    const byId = TypeTokens.mapOf(TypeTokens.int, TypeTokens.string);
    const value = decode(byId, { "1": "one", "02": "two" });
    expect(value).toEqual(
      new Map([
        [1, "one"],
        [2, "two"],
      ]),
    );
  });

  it("lets later entries win on decoded key collisions", () => {
    const byId = TypeTokens.mapOf(TypeTokens.int, TypeTokens.string);
    expect(decode(byId, { "1": "first", "01": "second" })).toEqual(
      new Map([[1, "second"]]),
    );
  });

  it("skips entries whose value decodes to nothing", () => {
    const root = ConfigurationNode.root().setValue({ a: 1, b: { c: 2 } });
    // "b" holds a map, which a string reads as nothing
    const strings = TypeTokens.mapOf(TypeTokens.string, TypeTokens.string);
    const serializer = root.getOptions().serializers.get(strings);
    expect(serializer?.deserialize(strings, root)).toEqual(new Map([["a", "1"]]));
  });

  it("reads only map-shaped nodes", () => {
    expect(decode(mapOfInts, [1, 2])).toEqual(new Map());
    expect(decode(mapOfInts, undefined)).toEqual(new Map());
  });

  it("writes entries in iteration order, replacing old children", () => {
    const root = ConfigurationNode.root().setValue({ value: { old: 1 } });
    const serializer = root.getOptions().serializers.get(mapOfInts);
    serializer?.serialize(
      mapOfInts,
      new Map([
        ["b", 2],
        ["a", 1],
      ]),
      root.getNode("value"),
    );
    expect(Array.from(root.getNode("value").getChildrenMap().keys())).toEqual([
      "b",
      "a",
    ]);
    expect(root.getValue()).toEqual({ value: { b: 2, a: 1 } });
  });

  it("encodes keys through the key serializer", () => {
    const byId = TypeTokens.mapOf(TypeTokens.int, TypeTokens.boolean);
    expect(encode(byId, new Map([[7, true]]))).toEqual({ "7": true });
  });

  it("fails when a key does not encode to a scalar", () => {
    const pairs = TypeTokens.mapOf(
      TypeTokens.listOf(TypeTokens.int),
      TypeTokens.int,
    );
    const error = catchMapperError(() => encode(pairs, new Map([[[1, 2], 3]])));
    expect(invalidMapKeyError.is(error)).toBe(true);
    expect(error.data).toEqual({ path: "value", type: "List<Integer>" });
  });

  it("uses serializers registered on the node's options", () => {
    const upper: TypeSerializer<string> = {
      deserialize: (_type, node) => node.getString()?.toUpperCase(),
      serialize: (_type, value, node) => {
        node.setValue(value.toLowerCase());
      },
    };
    const options = ConfigurationOptions.defaults().withSerializers((child) => {
      child.registerType(TypeTokens.string, upper);
    });
    const root = ConfigurationNode.root(options).setValue({ k: "v" });
    const strings = TypeTokens.mapOf(TypeTokens.string, TypeTokens.string);
    const serializer = options.serializers.get(strings);
    expect(serializer?.deserialize(strings, root)).toEqual(new Map([["K", "V"]]));
  });
});
