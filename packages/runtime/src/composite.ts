/**
 * Converters for structural type references (arrays, tuples, maps...).
 *
 * Element failures are reported as `FieldTypeError`s keyed by index or
 * entry key, so a deep failure carries a full path such as
 * `shapes.2.radius`.
 */

import { Tree, defineEntry } from "./tree.js";
import { FieldTypeError, InvalidDataError } from "./errors.js";
import { readWriter, type ReadWriter } from "./readwriter.js";
import type { LiteralValue, TypeRef } from "./plan.js";

export type NamedLookup = (name: string) => ReadWriter<unknown>;

function readAt<A>(rw: ReadWriter<A>, key: string, tree: Tree): A {
  try {
    return rw.read(tree);
  } catch (error) {
    throw new FieldTypeError(key, error);
  }
}

function expectArray(tree: Tree, expected: string): readonly Tree[] {
  if (tree.kind !== "array") throw new InvalidDataError(expected, Tree.describe(tree));
  return tree.items;
}

function writeOnlyError(expected: string, value: unknown): TypeError {
  return new TypeError(`Cannot write ${typeof value} as ${expected}`);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function literalRW(values: readonly LiteralValue[]): ReadWriter<unknown> {
  const expected = `one of ${values.map((v) => JSON.stringify(v)).join(", ")}`;
  return readWriter(
    (tree) => {
      if (
        (tree.kind === "string" || tree.kind === "number" || tree.kind === "boolean") &&
        values.includes(tree.value)
      ) {
        return tree.value;
      }
      throw new InvalidDataError(expected, Tree.describe(tree));
    },
    (value) => {
      switch (typeof value) {
        case "string":
          return Tree.str(value);
        case "number":
          return Tree.num(value);
        case "boolean":
          return Tree.bool(value);
        default:
          throw writeOnlyError(expected, value);
      }
    },
  );
}

function arrayRW(element: ReadWriter<unknown>): ReadWriter<unknown> {
  return readWriter(
    (tree) => expectArray(tree, "an array").map((item, i) => readAt(element, String(i), item)),
    (value) => {
      if (!Array.isArray(value)) throw writeOnlyError("an array", value);
      return Tree.arr(value.map((item: unknown) => element.write(item)));
    },
  );
}

function tupleRW(elements: readonly ReadWriter<unknown>[]): ReadWriter<unknown> {
  const expected = `an array of ${elements.length}`;
  return readWriter(
    (tree) => {
      const items = expectArray(tree, expected);
      if (items.length !== elements.length) {
        throw new InvalidDataError(expected, Tree.describe(tree));
      }
      return elements.map((rw, i) => readAt(rw, String(i), items[i]));
    },
    (value) => {
      if (!Array.isArray(value)) throw writeOnlyError(expected, value);
      return Tree.arr(elements.map((rw, i) => rw.write(value[i])));
    },
  );
}

function optionalRW(inner: ReadWriter<unknown>): ReadWriter<unknown> {
  return readWriter(
    (tree) => (tree.kind === "null" ? undefined : inner.read(tree)),
    (value) => (value === undefined ? Tree.nul() : inner.write(value)),
  );
}

function nullableRW(inner: ReadWriter<unknown>): ReadWriter<unknown> {
  return readWriter(
    (tree) => (tree.kind === "null" ? null : inner.read(tree)),
    (value) => (value === null ? Tree.nul() : inner.write(value)),
  );
}

function recordRW(valueRW: ReadWriter<unknown>): ReadWriter<unknown> {
  return readWriter(
    (tree) => {
      if (tree.kind !== "object") throw new InvalidDataError("an object", Tree.describe(tree));
      const out: Record<string, unknown> = {};
      for (const [k, v] of tree.fields) defineEntry(out, k, readAt(valueRW, k, v));
      return out;
    },
    (value) => {
      if (!isPlainRecord(value)) throw writeOnlyError("an object", value);
      return Tree.obj(Object.entries(value).map(([k, v]) => [k, valueRW.write(v)] as const));
    },
  );
}

/** Maps are written as an array of `[key, value]` pairs so any key type survives. */
function mapRW(keyRW: ReadWriter<unknown>, valueRW: ReadWriter<unknown>): ReadWriter<unknown> {
  const entry = tupleRW([keyRW, valueRW]);
  return readWriter(
    (tree) => {
      const out = new Map<unknown, unknown>();
      expectArray(tree, "an array of entries").forEach((item, i) => {
        const pair = readAt(entry, String(i), item);
        if (Array.isArray(pair)) out.set(pair[0], pair[1]);
      });
      return out;
    },
    (value) => {
      if (!(value instanceof Map)) throw writeOnlyError("a Map", value);
      return Tree.arr(Array.from(value, ([k, v]) => entry.write([k, v])));
    },
  );
}

function setRW(element: ReadWriter<unknown>): ReadWriter<unknown> {
  const items = arrayRW(element);
  return readWriter(
    (tree) => {
      const read = items.read(tree);
      return new Set(Array.isArray(read) ? read : []);
    },
    (value) => {
      if (!(value instanceof Set)) throw writeOnlyError("a Set", value);
      return items.write(Array.from(value));
    },
  );
}

/**
 * Build the converter for a type reference. Named references are handed to
 * `lookup`, which may return a forward reference for a type still being
 * derived.
 */
export function resolveTypeRef(ref: TypeRef, lookup: NamedLookup): ReadWriter<unknown> {
  switch (ref.kind) {
    case "named":
      return lookup(ref.name);
    case "literal":
      return literalRW(ref.values);
    case "array":
      return arrayRW(resolveTypeRef(ref.element, lookup));
    case "tuple":
      return tupleRW(ref.elements.map((el) => resolveTypeRef(el, lookup)));
    case "optional":
      return optionalRW(resolveTypeRef(ref.inner, lookup));
    case "nullable":
      return nullableRW(resolveTypeRef(ref.inner, lookup));
    case "record":
      return recordRW(resolveTypeRef(ref.value, lookup));
    case "map":
      return mapRW(resolveTypeRef(ref.key, lookup), resolveTypeRef(ref.value, lookup));
    case "set":
      return setRW(resolveTypeRef(ref.element, lookup));
  }
}
