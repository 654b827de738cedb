/**
 * Tests for sum and singleton converters
 */

import { describe, it, expect } from "vitest";
import {
  Tree,
  t,
  field,
  product,
  sum,
  singleton,
  plan,
  fromPlan,
  readJson,
  writeJson,
  DuplicateKeyError,
  ExpectedObjectError,
  FieldTypeError,
  MissingFieldError,
  NoVariantsError,
  UnknownVariantError,
  UnsupportedTypeError,
  type TypeShape,
} from "@pickler/runtime";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

class Circle {
  constructor(readonly r: number) {}
}

class Square {
  constructor(readonly s: number) {}
}

class Dot {
  static readonly instance = new Dot();
  private constructor() {}
}

type Shape = Circle | Square;

const circleShape = product("Circle", [field("r", t.number)], {
  construct: (r: number) => new Circle(r),
  is: (v) => v instanceof Circle,
});

const squareShape = product("Square", [field("s", t.number)], {
  construct: (s: number) => new Square(s),
  is: (v) => v instanceof Square,
});

const dotShape = singleton("Dot", () => Dot.instance, { is: (v) => v instanceof Dot });

const shapePlan = plan("Shape", [sum("Shape", ["Circle", "Square"]), circleShape, squareShape]);
const shapeRW = fromPlan<Shape>(shapePlan);

describe("sum converters", () => {
  it("should tag an alternative with its name", () => {
    expect(writeJson(shapeRW, new Circle(3))).toBe('{"$type":"Circle","r":3}');
    expect(shapeRW.write(new Square(2))).toEqual(
      Tree.obj([
        ["$type", Tree.str("Square")],
        ["s", Tree.num(2)],
      ]),
    );
  });

  it("should read an alternative back by its tag", () => {
    const circle = readJson(shapeRW, '{"$type":"Circle","r":3}');
    expect(circle).toBeInstanceOf(Circle);
    expect(circle).toEqual(new Circle(3));
    expect(readJson(shapeRW, '{"s":2,"$type":"Square"}')).toEqual(new Square(2));
  });

  it("should reject an unknown tag", () => {
    const error = thrown(() => readJson(shapeRW, '{"$type":"Triangle","a":1}'));
    expect(error).toBeInstanceOf(UnknownVariantError);
    expect(error).toMatchObject({
      tag: "Triangle",
      message: "Unknown variant `Triangle` (expected one of: Circle, Square)",
    });
  });

  it("should require the tag", () => {
    const error = thrown(() => readJson(shapeRW, '{"r":3}'));
    expect(error).toBeInstanceOf(MissingFieldError);
    expect(error).toMatchObject({ field: "$type" });
  });

  it("should require a string tag", () => {
    const error = thrown(() => readJson(shapeRW, '{"$type":1}'));
    expect(error).toBeInstanceOf(FieldTypeError);
    expect(error).toMatchObject({
      path: ["$type"],
      message: "Invalid value at `$type`: Expected a tag string, found number 1",
    });
  });

  it("should require an object", () => {
    expect(() => readJson(shapeRW, '"Circle"')).toThrow(ExpectedObjectError);
  });

  it("should refuse to write a value outside the union", () => {
    expect(() => shapeRW.write({ r: 3 })).toThrow("Value is not an alternative of `Shape`");
  });

  it("should honour a custom tag key", () => {
    const rw = fromPlan<Shape>(shapePlan, { tagKey: "kind" });
    expect(writeJson(rw, new Circle(3))).toBe('{"kind":"Circle","r":3}');
    expect(readJson(rw, '{"kind":"Square","s":1}')).toEqual(new Square(1));
  });

  it("should use an explicit tag", () => {
    const rw = fromPlan<Shape>(
      plan("Shape", [
        sum("Shape", ["Circle", "Square"]),
        { ...circleShape, tag: "round" },
        squareShape,
      ]),
    );
    expect(writeJson(rw, new Circle(1))).toBe('{"$type":"round","r":1}');
    expect(readJson(rw, '{"$type":"round","r":1}')).toEqual(new Circle(1));
    expect(() => readJson(rw, '{"$type":"Circle","r":1}')).toThrow(UnknownVariantError);
  });
});

describe("nested sums and singletons", () => {
  type Mark = Shape | Dot;

  const markRW = fromPlan<Mark>(
    plan("Mark", [
      sum("Mark", ["Shape", "Dot"]),
      sum("Shape", ["Circle", "Square"]),
      circleShape,
      squareShape,
      dotShape,
    ]),
  );

  it("should tag values of a nested sum with their own alternative", () => {
    expect(writeJson(markRW, new Circle(1))).toBe('{"$type":"Circle","r":1}');
    expect(readJson(markRW, '{"$type":"Square","s":4}')).toEqual(new Square(4));
  });

  it("should write a singleton as a bare tag", () => {
    expect(writeJson(markRW, Dot.instance)).toBe('{"$type":"Dot"}');
    expect(readJson(markRW, '{"$type":"Dot"}')).toBe(Dot.instance);
  });

  it("should read any tree as the singleton when derived directly", () => {
    const dotRW = fromPlan<Dot>(plan("Dot", [dotShape]));
    expect(writeJson(dotRW, Dot.instance)).toBe("{}");
    expect(dotRW.read(Tree.num(1))).toBe(Dot.instance);
  });

  it("should not tag an alternative derived on its own", () => {
    const circleRW = fromPlan<Circle>(plan("Circle", [circleShape]));
    expect(writeJson(circleRW, new Circle(3))).toBe('{"r":3}');
  });
});

describe("sum validation", () => {
  it("should reject an empty sum", () => {
    const error = thrown(() => fromPlan(plan("Never", [sum("Never", [])])));
    expect(error).toBeInstanceOf(NoVariantsError);
    expect(error).toMatchObject({ code: 9702, message: "Sum type `Never` has no alternatives" });
  });

  it("should reject two alternatives with the same tag", () => {
    const shapes: TypeShape[] = [
      sum("Shape", ["Circle", "Square"]),
      circleShape,
      { ...squareShape, tag: "Circle" },
    ];
    const error = thrown(() => fromPlan(plan("Shape", shapes)));
    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error).toMatchObject({ message: "Duplicate tag `Circle` in `Shape`" });
  });

  it("should reject an alternative with a field under the tag key", () => {
    const shapes: TypeShape[] = [
      sum("Shape", ["Circle"]),
      product("Circle", [field("kind", t.string, { key: "$type" })], { is: () => true }),
    ];
    const error = thrown(() => fromPlan(plan("Shape", shapes)));
    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error).toMatchObject({ key: "$type", what: "field" });
  });

  it("should reject an alternative without a type test", () => {
    const shapes: TypeShape[] = [sum("Shape", ["Circle"]), product("Circle", [field("r", t.number)])];
    expect(() => fromPlan(plan("Shape", shapes))).toThrow(UnsupportedTypeError);
  });

  it("should reject an alternative missing from the plan", () => {
    expect(() => fromPlan(plan("Shape", [sum("Shape", ["Circle"])]))).toThrow(
      "Cannot derive a converter for `Circle`: alternative of `Shape` has no shape in the plan",
    );
  });
});
