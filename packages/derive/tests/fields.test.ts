/**
 * Tests for field plans: keys, defaults, optional and rest parameters, types
 */

import { describe, it, expect } from "vitest";
import { PK9720, PK9721 } from "@pickler/core";
import { DuplicateKeyError, UnsupportedTypeError, t } from "@pickler/runtime";
import { derive, deriveError, shapeNamed } from "./fixture.js";

function fieldsOf(body: string, name: string): unknown {
  const shape = shapeNamed(derive(body).plan, name);
  return shape.kind === "product" ? shape.fields : undefined;
}

describe("keys", () => {
  it("should rename a parameter with @key", () => {
    const fields = fieldsOf(
      `
      class User {
        constructor(@key("user_name") readonly name: string, readonly age: number) {}
      }
      const rw = deriveReadWriter<User>();
    `,
      "User",
    );

    expect(fields).toEqual([
      { name: "name", key: "user_name", type: t.string },
      { name: "age", key: "age", type: t.number },
    ]);
  });

  it("should reject two fields under one key", () => {
    const error = deriveError(`
      class Account {
        constructor(@key("id") readonly accountId: string, readonly id: string) {}
      }
      const rw = deriveReadWriter<Account>();
    `);

    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error.message).toBe("Duplicate field `id` in `Account`");
  });
});

describe("defaults", () => {
  it("should keep literal and in-scope defaults as source text", () => {
    const fields = fieldsOf(
      `
      const ORIGIN = 0;
      class Vec {
        constructor(readonly x: number = ORIGIN, readonly y = 1, readonly z?: number) {}
      }
      const rw = deriveReadWriter<Vec>();
    `,
      "Vec",
    );

    expect(fields).toEqual([
      { name: "x", key: "x", type: t.number, defaultText: "ORIGIN" },
      { name: "y", key: "y", type: t.number, defaultText: "1" },
      { name: "z", key: "z", type: t.number, optional: true },
    ]);
  });

  it("should read a default that uses another parameter as optional", () => {
    const { plan, warnings } = derive(`
      class Span {
        constructor(readonly start: number, readonly end: number = start + 1) {}
      }
      const rw = deriveReadWriter<Span>();
    `);

    expect(shapeNamed(plan, "Span")).toMatchObject({
      fields: [
        { name: "start", key: "start", type: t.number },
        { name: "end", key: "end", type: t.number, optional: true },
      ],
    });
    expect(warnings).toEqual([{ code: PK9720.code, args: { type: "Span", field: "end" } }]);
  });

  it("should read a default that uses a name hidden at the call as optional", () => {
    const { plan, warnings } = derive(`
      const LIMIT = 10;
      class Quota {
        constructor(readonly max: number = LIMIT) {}
      }
      function build() {
        const LIMIT = "shadow";
        return deriveReadWriter<Quota>();
      }
    `);

    expect(shapeNamed(plan, "Quota")).toMatchObject({
      fields: [{ name: "max", key: "max", type: t.number, optional: true }],
    });
    expect(warnings).toEqual([
      { code: PK9721.code, args: { type: "Quota", field: "max", name: "LIMIT" } },
    ]);
  });
});

describe("rest parameters", () => {
  it("should plan a rest parameter as a variadic field of its element type", () => {
    const fields = fieldsOf(
      `
      class Polyline {
        readonly points: number[];
        constructor(readonly name: string, ...points: number[]) {
          this.points = points;
        }
      }
      const rw = deriveReadWriter<Polyline>();
    `,
      "Polyline",
    );

    expect(fields).toEqual([
      { name: "name", key: "name", type: t.string },
      { name: "points", key: "points", type: t.number, variadic: true },
    ]);
  });

  it("should reject a rest parameter typed as a tuple", () => {
    const error = deriveError(`
      class Args {
        constructor(...args: [number, string]) {}
      }
      const rw = deriveReadWriter<Args>();
    `);

    expect(error).toBeInstanceOf(UnsupportedTypeError);
    expect(error.message).toBe(
      "Cannot derive a converter for `Args`: rest parameter `args` must have an array type",
    );
  });
});

describe("field types", () => {
  it("should map containers, literals and nullable types", () => {
    const fields = fieldsOf(
      `
      class Inventory {
        constructor(
          readonly tags: Set<string>,
          readonly counts: Map<string, number>,
          readonly labels: Record<string, string>,
          readonly pair: [number, string],
          readonly note: string | null,
          readonly size: "s" | "m" | "l",
          readonly seen: Date,
          readonly flags: readonly boolean[],
        ) {}
      }
      const rw = deriveReadWriter<Inventory>();
    `,
      "Inventory",
    );

    expect(fields).toEqual([
      { name: "tags", key: "tags", type: t.set(t.string) },
      { name: "counts", key: "counts", type: t.map(t.string, t.number) },
      { name: "labels", key: "labels", type: t.record(t.string) },
      { name: "pair", key: "pair", type: t.tuple(t.number, t.string) },
      { name: "note", key: "note", type: t.nullable(t.string) },
      { name: "size", key: "size", type: t.literal("s", "m", "l") },
      { name: "seen", key: "seen", type: t.date },
      { name: "flags", key: "flags", type: t.array(t.boolean) },
    ]);
  });

  it("should reject a function-typed field", () => {
    const error = deriveError(`
      class Handler {
        constructor(readonly run: (x: number) => void) {}
      }
      const rw = deriveReadWriter<Handler>();
    `);

    expect(error.message).toBe(
      "Cannot derive a converter for `Handler`: `(x: number) => void` is a function type",
    );
  });

  it("should reject an inline union of classes", () => {
    const error = deriveError(`
      class Circle {
        constructor(readonly r: number) {}
      }
      class Square {
        constructor(readonly side: number) {}
      }
      class Holder {
        constructor(readonly shape: Circle | Square) {}
      }
      const rw = deriveReadWriter<Holder>();
    `);

    expect(error.message).toBe(
      "Cannot derive a converter for `Holder`: the inline union `Circle | Square` has no tag to tell its members apart; declare a type alias for it",
    );
  });
});
