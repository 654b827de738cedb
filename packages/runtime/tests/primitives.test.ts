/**
 * Tests for primitive converters and the converter registry
 */

import { describe, it, expect } from "vitest";
import {
  Tree,
  InvalidDataError,
  numberRW,
  stringRW,
  booleanRW,
  nullRW,
  undefinedRW,
  unknownRW,
  bigintRW,
  dateRW,
  createRegistry,
  defaultRegistry,
  readWriter,
  validate,
} from "@pickler/runtime";

describe("primitive converters", () => {
  it("should write and read scalars", () => {
    expect(numberRW.write(1.5)).toEqual(Tree.num(1.5));
    expect(numberRW.read(Tree.num(-2))).toBe(-2);
    expect(stringRW.read(stringRW.write("hi"))).toBe("hi");
    expect(booleanRW.read(booleanRW.write(true))).toBe(true);
    expect(nullRW.write(null)).toEqual(Tree.nul());
    expect(nullRW.read(Tree.nul())).toBeNull();
    expect(undefinedRW.read(Tree.nul())).toBeUndefined();
  });

  it("should name the expected kind on a mismatch", () => {
    expect(() => numberRW.read(Tree.str("1"))).toThrow('Expected a number, found string "1"');
    expect(() => stringRW.read(Tree.num(1))).toThrow("Expected a string, found number 1");
    expect(() => booleanRW.read(Tree.nul())).toThrow("Expected a boolean, found null");
    expect(() => nullRW.read(Tree.bool(false))).toThrow(InvalidDataError);
  });

  it("should write non-finite numbers as strings and read them back", () => {
    expect(numberRW.write(NaN)).toEqual(Tree.str("NaN"));
    expect(numberRW.write(-Infinity)).toEqual(Tree.str("-Infinity"));
    expect(numberRW.read(Tree.str("NaN"))).toBeNaN();
    expect(numberRW.read(numberRW.write(Infinity))).toBe(Infinity);
    expect(() => numberRW.read(Tree.str("nan"))).toThrow('Expected a number, found string "nan"');
  });

  it("should write bigints as decimal strings", () => {
    expect(bigintRW.write(12345678901234567890n)).toEqual(Tree.str("12345678901234567890"));
    expect(bigintRW.read(Tree.str("-42"))).toBe(-42n);
    expect(() => bigintRW.read(Tree.str("abc"))).toThrow(
      'Expected a decimal integer string, found string "abc"',
    );
  });

  it("should write dates as ISO strings", () => {
    const date = new Date("2024-01-02T03:04:05.000Z");
    expect(dateRW.write(date)).toEqual(Tree.str("2024-01-02T03:04:05.000Z"));
    expect(dateRW.read(Tree.str("2024-01-02T03:04:05.000Z")).getTime()).toBe(date.getTime());
    expect(() => dateRW.read(Tree.str("not a date"))).toThrow(InvalidDataError);
  });

  it("should pass unknown values through as JSON", () => {
    expect(unknownRW.write({ a: [1] })).toEqual(Tree.obj([["a", Tree.arr([Tree.num(1)])]]));
    expect(unknownRW.read(Tree.arr([Tree.str("x")]))).toEqual(["x"]);
    expect(Object.getOwnPropertyNames(unknownRW.read(Tree.obj([["__proto__", Tree.num(1)]])))).toEqual(["__proto__"]);
  });
});

describe("validate", () => {
  it("should turn unexpected failures into InvalidDataError", () => {
    const even = validate("an even number", (tree) => {
      const n = numberRW.read(tree);
      if (n % 2 !== 0) throw new RangeError("odd");
      return n;
    });
    expect(even(Tree.num(4))).toBe(4);
    expect(() => even(Tree.num(3))).toThrow("Expected an even number, found number 3");
  });

  it("should let conversion errors through unchanged", () => {
    const read = validate("an even number", (tree) => numberRW.read(tree));
    expect(() => read(Tree.str("4"))).toThrow('Expected a number, found string "4"');
  });
});

describe("ReadWriterRegistry", () => {
  it("should start with the primitives", () => {
    const registry = createRegistry();
    for (const name of ["number", "string", "boolean", "null", "undefined", "unknown", "bigint", "Date"]) {
      expect(registry.has(name)).toBe(true);
    }
    expect(defaultRegistry.get("number")).toBe(numberRW);
  });

  it("should start empty when asked to", () => {
    const registry = createRegistry({ primitives: false });
    expect(registry.names()).toEqual([]);
  });

  it("should register custom converters", () => {
    const registry = createRegistry();
    const upper = readWriter(
      (tree) => stringRW.read(tree).toUpperCase(),
      (value: string) => Tree.str(value.toLowerCase()),
    );
    registry.register("Upper", upper);
    expect(registry.get("Upper")?.read(Tree.str("abc"))).toBe("ABC");
  });

  it("should reject duplicates by default", () => {
    const registry = createRegistry();
    expect(() => registry.register("number", stringRW)).toThrow(
      "ReadWriterRegistry: converter for 'number' already exists",
    );
  });

  it("should honour the duplicate strategy", () => {
    const replacing = createRegistry({ duplicateStrategy: "replace" });
    replacing.register("number", stringRW);
    expect(replacing.get("number")).toBe(stringRW);

    const skipping = createRegistry({ duplicateStrategy: "skip" });
    skipping.register("number", stringRW);
    expect(skipping.get("number")).toBe(numberRW);
  });
});
