/**
 * Tests for plan emission
 */

import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { fromPlan, readJson, t, writeJson, type DerivationPlan } from "@pickler/runtime";
import { emitPlan, type PlanModel } from "../src/index.js";

class Circle {
  constructor(readonly r: number) {}
}

class Empty {
  static readonly instance = new Empty();
  private constructor() {}
}

type Shape = Circle | Empty;

const model: PlanModel = {
  root: "Shape",
  shapes: [
    { kind: "sum", name: "Shape", variants: ["Circle", "Empty"] },
    {
      kind: "product",
      name: "Circle",
      tag: "circle",
      fields: [{ name: "r", key: "radius", type: t.number, defaultText: "1" }],
      construction: { kind: "new", target: "Circle" },
      unapply: false,
    },
    { kind: "singleton", name: "Empty", tag: "Empty", target: "Empty", member: "instance" },
  ],
  options: { tagKey: "$type", omitDefaults: true },
};

/** Evaluate emitted plan text with `Circle` and `Empty` in scope. */
function evaluate(text: string): DerivationPlan {
  const js = ts.transpileModule(`(${text})`, {
    compilerOptions: { target: ts.ScriptTarget.ES2022 },
  }).outputText;
  return new Function("Circle", "Empty", `return ${js}`)(Circle, Empty);
}

describe("emitPlan", () => {
  it("should print shapes as an object literal", () => {
    expect(emitPlan(model).split("\n")).toEqual([
      "{",
      '  root: "Shape",',
      "  shapes: {",
      '    "Shape": {',
      '      kind: "sum",',
      '      name: "Shape",',
      '      variants: ["Circle", "Empty"],',
      "    },",
      '    "Circle": {',
      '      kind: "product",',
      '      name: "Circle",',
      '      tag: "circle",',
      "      fields: [",
      '        { name: "r", key: "radius", type: {"kind":"named","name":"number"}, default: () => (1) },',
      "      ],",
      "      construct: (...args: any[]) => new Circle(...args),",
      "      is: (value: unknown) => value instanceof Circle,",
      "    },",
      '    "Empty": {',
      '      kind: "singleton",',
      '      name: "Empty",',
      '      tag: "Empty",',
      "      instance: () => Empty.instance,",
      "      is: (value: unknown) => value === Empty.instance,",
      "    },",
      "  },",
      '  options: { tagKey: "$type", omitDefaults: true },',
      "}",
    ]);
  });

  it("should print factory, unapply and record products", () => {
    const text = emitPlan({
      root: "Money",
      shapes: [
        {
          kind: "product",
          name: "Money",
          tag: "Money",
          fields: [{ name: "cents", key: "cents", type: t.number, optional: true }],
          construction: { kind: "factory", target: "Money" },
          unapply: true,
        },
        {
          kind: "product",
          name: "Meta",
          tag: "Meta",
          fields: [{ name: "items", key: "items", type: t.string, variadic: true }],
          construction: { kind: "record" },
          unapply: false,
        },
      ],
      options: { tagKey: "kind", omitDefaults: false },
    });

    expect(text).toContain('        { name: "cents", key: "cents", type: {"kind":"named","name":"number"}, optional: true },');
    expect(text).toContain("      construct: (...args: any[]) => Money.of(...args),");
    expect(text).toContain("      deconstruct: (value: any) => Money.unapply(value),");
    expect(text).toContain('        { name: "items", key: "items", type: {"kind":"named","name":"string"}, variadic: true },');
    expect(text).not.toContain("Meta.");
    expect(text).toContain('  options: { tagKey: "kind", omitDefaults: false },');
  });

  it("should evaluate to a plan the runtime derives converters from", () => {
    const shapeRW = fromPlan<Shape>(evaluate(emitPlan(model)));

    expect(writeJson(shapeRW, new Circle(2))).toBe('{"$type":"circle","radius":2}');
    expect(writeJson(shapeRW, new Circle(1))).toBe('{"$type":"circle"}');
    expect(writeJson(shapeRW, Empty.instance)).toBe('{"$type":"Empty"}');
    expect(readJson(shapeRW, '{"$type":"circle"}')).toEqual(new Circle(1));
    expect(readJson(shapeRW, '{"$type":"Empty"}')).toBe(Empty.instance);
  });
});
