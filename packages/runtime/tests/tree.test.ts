/**
 * Tests for the tree value model and its JSON bridge
 */

import { describe, it, expect } from "vitest";
import { Tree, fromJson, toJson, parse, stringify, InvalidDataError } from "@pickler/runtime";

describe("Tree", () => {
  it("should keep object fields in insertion order", () => {
    const node = Tree.obj([
      ["b", Tree.num(1)],
      ["a", Tree.num(2)],
      ["10", Tree.bool(true)],
    ]);
    expect(stringify(node)).toBe('{"b":1,"a":2,"10":true}');
  });

  it("should return the last occurrence of a repeated key", () => {
    const node = Tree.obj([
      ["a", Tree.num(1)],
      ["a", Tree.num(2)],
    ]);
    expect(Tree.get(node, "a")).toEqual(Tree.num(2));
    expect(Tree.get(node, "b")).toBeUndefined();
  });

  it("should drop and prepend fields without touching the original", () => {
    const node = Tree.obj([
      ["x", Tree.num(1)],
      ["y", Tree.num(2)],
    ]);
    expect(stringify(Tree.without(node, "x"))).toBe('{"y":2}');
    expect(stringify(Tree.prepend(node, "$type", Tree.str("P")))).toBe('{"$type":"P","x":1,"y":2}');
    expect(stringify(node)).toBe('{"x":1,"y":2}');
  });

  describe("equals", () => {
    it("should compare objects field by field in order", () => {
      const ab = Tree.obj([
        ["a", Tree.num(1)],
        ["b", Tree.num(2)],
      ]);
      const ba = Tree.obj([
        ["b", Tree.num(2)],
        ["a", Tree.num(1)],
      ]);
      expect(Tree.equals(ab, parse('{"a":1,"b":2}'))).toBe(true);
      expect(Tree.equals(ab, ba)).toBe(false);
    });

    it("should compare arrays and scalars structurally", () => {
      expect(Tree.equals(Tree.arr([Tree.num(1), Tree.nul()]), parse("[1,null]"))).toBe(true);
      expect(Tree.equals(Tree.arr([]), Tree.arr([Tree.num(1)]))).toBe(false);
      expect(Tree.equals(Tree.str("1"), Tree.num(1))).toBe(false);
      expect(Tree.equals(Tree.num(NaN), Tree.num(NaN))).toBe(true);
    });
  });

  it("should describe nodes for error messages", () => {
    expect(Tree.describe(Tree.str("x"))).toBe('string "x"');
    expect(Tree.describe(Tree.num(3))).toBe("number 3");
    expect(Tree.describe(Tree.bool(false))).toBe("boolean false");
    expect(Tree.describe(Tree.nul())).toBe("null");
    expect(Tree.describe(Tree.arr([Tree.nul(), Tree.nul()]))).toBe("array of 2");
    expect(Tree.describe(Tree.obj([["a", Tree.nul()]]))).toBe("object with 1 field");
    expect(Tree.describe(Tree.obj())).toBe("object with 0 fields");
  });
});

describe("JSON bridge", () => {
  it("should convert between trees and plain values", () => {
    const tree = parse('{"a":[1,"x",null,false]}');
    expect(tree).toEqual(
      Tree.obj([["a", Tree.arr([Tree.num(1), Tree.str("x"), Tree.nul(), Tree.bool(false)])]]),
    );
    expect(toJson(tree)).toEqual({ a: [1, "x", null, false] });
    expect(fromJson({ n: 2 })).toEqual(Tree.obj([["n", Tree.num(2)]]));
  });

  it("should escape strings and keys", () => {
    expect(stringify(Tree.obj([['k"', Tree.str('a"b\n')]]))).toBe('{"k\\"":"a\\"b\\n"}');
  });

  it("should write non-finite numbers as null", () => {
    expect(stringify(Tree.arr([Tree.num(Infinity), Tree.num(NaN)]))).toBe("[null,null]");
  });

  it("should reject malformed text", () => {
    expect(() => parse("{")).toThrow(InvalidDataError);
  });

  it("should reject values JSON cannot hold", () => {
    expect(() => fromJson(undefined)).toThrow("Expected a JSON value, found undefined");
    expect(() => fromJson({ f: () => 1 })).toThrow("Expected a JSON value, found function");
  });
});
