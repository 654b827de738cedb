/**
 * Tree value model
 *
 * The generic, JSON-shaped value every derived converter reads from and
 * writes to. Objects keep their fields as ordered pairs so a writer's
 * field order survives all the way to the serialized text.
 *
 * @example
 * ```typescript
 * const point = Tree.obj([["x", Tree.num(1)], ["y", Tree.num(2)]]);
 * stringify(point); // '{"x":1,"y":2}'
 * ```
 */

import { InvalidDataError } from "./errors.js";

// ============================================================================
// Node Types
// ============================================================================

export interface TreeObject {
  readonly kind: "object";
  readonly fields: ReadonlyArray<readonly [string, Tree]>;
}

export interface TreeArray {
  readonly kind: "array";
  readonly items: readonly Tree[];
}

export interface TreeString {
  readonly kind: "string";
  readonly value: string;
}

export interface TreeNumber {
  readonly kind: "number";
  readonly value: number;
}

export interface TreeBoolean {
  readonly kind: "boolean";
  readonly value: boolean;
}

export interface TreeNull {
  readonly kind: "null";
}

export type Tree = TreeObject | TreeArray | TreeString | TreeNumber | TreeBoolean | TreeNull;

export type TreeKind = Tree["kind"];

/** Plain JSON value, as produced by `JSON.parse`. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ============================================================================
// Constructors and Accessors
// ============================================================================

const NULL: TreeNull = { kind: "null" };

function obj(fields: Iterable<readonly [string, Tree]> = []): TreeObject {
  return { kind: "object", fields: Array.from(fields) };
}

function arr(items: Iterable<Tree> = []): TreeArray {
  return { kind: "array", items: Array.from(items) };
}

function str(value: string): TreeString {
  return { kind: "string", value };
}

function num(value: number): TreeNumber {
  return { kind: "number", value };
}

function bool(value: boolean): TreeBoolean {
  return { kind: "boolean", value };
}

function nul(): TreeNull {
  return NULL;
}

/**
 * Look up a field of an object node. When a key occurs more than once the
 * last occurrence wins, matching `JSON.parse`.
 */
function get(node: TreeObject, key: string): Tree | undefined {
  for (let i = node.fields.length - 1; i >= 0; i--) {
    const [k, v] = node.fields[i];
    if (k === key) return v;
  }
  return undefined;
}

function has(node: TreeObject, key: string): boolean {
  return node.fields.some(([k]) => k === key);
}

/** Copy of `node` without any field named `key`. */
function without(node: TreeObject, key: string): TreeObject {
  return obj(node.fields.filter(([k]) => k !== key));
}

/** Copy of `node` with `[key, value]` placed first. */
function prepend(node: TreeObject, key: string, value: Tree): TreeObject {
  return obj([[key, value], ...node.fields]);
}

/**
 * Structural equality. Object fields are compared as ordered pairs, so two
 * objects written by the same writer compare equal exactly when every
 * field does.
 */
function equals(a: Tree, b: Tree): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "string":
    case "boolean":
      return b.kind === a.kind && b.value === a.value;
    case "number":
      return b.kind === "number" && Object.is(a.value, b.value);
    case "array":
      return (
        b.kind === "array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => equals(item, b.items[i]))
      );
    case "object":
      return (
        b.kind === "object" &&
        a.fields.length === b.fields.length &&
        a.fields.every(([k, v], i) => b.fields[i][0] === k && equals(v, b.fields[i][1]))
      );
  }
}

/** Short human-readable description used in error messages. */
function describe(node: Tree): string {
  switch (node.kind) {
    case "null":
      return "null";
    case "string":
      return `string ${JSON.stringify(node.value)}`;
    case "number":
    case "boolean":
      return `${node.kind} ${String(node.value)}`;
    case "array":
      return `array of ${node.items.length}`;
    case "object":
      return `object with ${node.fields.length} field${node.fields.length === 1 ? "" : "s"}`;
  }
}

export const Tree = {
  obj,
  arr,
  str,
  num,
  bool,
  nul,
  get,
  has,
  without,
  prepend,
  equals,
  describe,
} as const;

// ============================================================================
// JSON Bridge
// ============================================================================

function isJsonObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert a plain JS value to a tree. Only JSON-representable values are
 * accepted; anything else is an `InvalidDataError`.
 */
export function fromJson(value: unknown): Tree {
  if (value === null) return NULL;
  switch (typeof value) {
    case "string":
      return str(value);
    case "number":
      return num(value);
    case "boolean":
      return bool(value);
  }
  if (Array.isArray(value)) {
    return arr(value.map(fromJson));
  }
  if (isJsonObject(value)) {
    return obj(Object.entries(value).map(([k, v]) => [k, fromJson(v)] as const));
  }
  throw new InvalidDataError("a JSON value", typeof value);
}

/**
 * Set `key` as an own enumerable property. Plain assignment would run the
 * `__proto__` setter for that key instead.
 */
export function defineEntry<V>(target: { [key: string]: V }, key: string, value: V): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export function toJson(node: Tree): JsonValue {
  switch (node.kind) {
    case "null":
      return null;
    case "string":
    case "number":
    case "boolean":
      return node.value;
    case "array":
      return node.items.map(toJson);
    case "object": {
      const out: { [key: string]: JsonValue } = {};
      for (const [k, v] of node.fields) defineEntry(out, k, toJson(v));
      return out;
    }
  }
}

/** Parse JSON text into a tree. Malformed text is an `InvalidDataError`. */
export function parse(text: string): Tree {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new InvalidDataError("JSON text", String(error), { cause: error });
  }
  return fromJson(value);
}

/**
 * Render a tree as compact JSON text. Fields are emitted in tree order,
 * including integer-like keys that `JSON.stringify` would reorder.
 */
export function stringify(node: Tree): string {
  switch (node.kind) {
    case "null":
      return "null";
    case "string":
      return JSON.stringify(node.value);
    case "number":
      return Number.isFinite(node.value) ? String(node.value) : "null";
    case "boolean":
      return node.value ? "true" : "false";
    case "array":
      return `[${node.items.map(stringify).join(",")}]`;
    case "object":
      return `{${node.fields.map(([k, v]) => `${JSON.stringify(k)}:${stringify(v)}`).join(",")}}`;
  }
}
