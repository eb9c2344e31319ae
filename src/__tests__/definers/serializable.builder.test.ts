import { ObjectMapper } from "../../objectmapping/ObjectMapper";
import {
  findVariant,
  getVariants,
  mappedTypeOf,
  serializable,
  serializableInterface,
} from "../../objectmapping/definers";
import { isMappedType } from "../../objectmapping/MappedType";
import { defineRawType } from "../../tokens/RawType";
import { TypeTokens } from "../../tokens/builtins";
import { catchMapperError } from "../fixtures";

abstract class Shape {
  label?: string;
}

const ShapeType = serializable(Shape)
  .abstract()
  .setting("label", TypeTokens.string)
  .build();

class Circle extends Shape {
  radius = 1;
}

const CircleType = serializable(Circle)
  .extends(ShapeType)
  .factory(() => new Circle())
  .setting("radius", TypeTokens.double)
  .build();

describe("serializable builder", () => {
  it("returns a new builder for every step", () => {
    class Point {
      x = 0;
      y = 0;
    }
    const base = serializable(Point, "Point2D").setting("x", TypeTokens.int);
    const extended = base.setting("y", TypeTokens.int);

    expect(base.build().settings.map((setting) => setting.field)).toEqual(["x"]);
    expect(extended.build().settings.map((setting) => setting.field)).toEqual([
      "x",
      "y",
    ]);
    expect(extended.name).toBe("Point2D");
  });

  it("defaults the name to the class name and the path to the field", () => {
    expect(CircleType.name).toBe("Circle");
    expect(CircleType.settings).toEqual([
      { field: "radius", type: TypeTokens.double, path: "radius", comment: undefined },
    ]);
  });

  it("treats empty paths and comments as absent", () => {
    class Flag {
      on = false;
    }
    const FlagType = serializable(Flag)
      .setting("on", TypeTokens.boolean, { path: "", comment: "" })
      .build();

    expect(FlagType.settings[0].path).toBe("on");
    expect(FlagType.settings[0].comment).toBeUndefined();
  });

  it("builds frozen mapped types", () => {
    expect(Object.isFrozen(CircleType)).toBe(true);
    expect(Object.isFrozen(CircleType.settings)).toBe(true);
    expect(isMappedType(CircleType)).toBe(true);
    expect(isMappedType(defineRawType("Circle"))).toBe(false);
    expect(CircleType.type.getRawType()).toBe(CircleType);
  });

  it("registers concrete types as variants of their abstract ancestors", () => {
    expect(findVariant(ShapeType, "Circle")).toBe(CircleType);
    expect(Array.from(getVariants(ShapeType).keys())).toEqual(["Circle"]);
    expect(findVariant(CircleType, "Circle")).toBeUndefined();
  });

  it("registers variants transitively", () => {
    abstract class Polygon extends Shape {}
    const PolygonType = serializable(Polygon).abstract().extends(ShapeType).build();
    class Square extends Polygon {
      side = 1;
    }
    const SquareType = serializable(Square)
      .extends(PolygonType)
      .factory(() => new Square())
      .build();

    expect(findVariant(ShapeType, "Square")).toBe(SquareType);
    expect(findVariant(ShapeType, "Polygon")).toBe(PolygonType);
    expect(findVariant(PolygonType, "Square")).toBe(SquareType);
  });

  it("rejects a second variant with the same name", () => {
    class OtherCircle extends Shape {}

    const error = catchMapperError(() =>
      serializable(OtherCircle, "Circle").extends(ShapeType).build(),
    );

    expect(error.id).toBe("mapper.errors.duplicateVariant");
    expect(error.message).toBe(
      'A variant named "Circle" is already registered for Shape',
    );
    expect(findVariant(ShapeType, "Circle")).toBe(CircleType);
  });

  it("finds the declaration of an instance through its prototype chain", () => {
    class BigCircle extends Circle {}

    expect(mappedTypeOf(new Circle())).toBe(CircleType);
    expect(mappedTypeOf(new BigCircle())).toBe(CircleType);
    expect(mappedTypeOf(new Date())).toBeUndefined();
  });

  it("declares interfaces as abstract types without a class", () => {
    interface Sized {
      size?: number;
    }
    const SizedType = serializableInterface<Sized>("Sized")
      .setting("size", TypeTokens.int)
      .build();

    expect(SizedType.abstract).toBe(true);
    expect(SizedType.ctor).toBeUndefined();
    expect(catchMapperError(() => ObjectMapper.forClass(SizedType)).id).toBe(
      "mapper.errors.abstractType",
    );
  });
});
