/**
 * Derivation plans
 *
 * A plan is the data the converter synthesizer works from: one
 * {@link TypeShape} per named type reachable from the root, keyed by type
 * key. The transformer emits plans as object literals at each
 * `deriveReadWriter<T>()` call site; tests and applications without the
 * transformer can build the same structure with the helpers below.
 *
 * @example
 * ```typescript
 * const points = plan("Point", [
 *   product("Point", [field("x", t.number, { default: () => 0 }), field("y", t.number)], {
 *     construct: (x: number, y: number) => new Point(x, y),
 *     is: (v) => v instanceof Point,
 *   }),
 * ]);
 * ```
 */

// ============================================================================
// Type References
// ============================================================================

export type LiteralValue = string | number | boolean;

/** How a field's declared type is named inside a plan. */
export type TypeRef =
  | { readonly kind: "named"; readonly name: string }
  | { readonly kind: "literal"; readonly values: readonly LiteralValue[] }
  | { readonly kind: "array"; readonly element: TypeRef }
  | { readonly kind: "tuple"; readonly elements: readonly TypeRef[] }
  | { readonly kind: "optional"; readonly inner: TypeRef }
  | { readonly kind: "nullable"; readonly inner: TypeRef }
  | { readonly kind: "record"; readonly value: TypeRef }
  | { readonly kind: "map"; readonly key: TypeRef; readonly value: TypeRef }
  | { readonly kind: "set"; readonly element: TypeRef };

function named(name: string): TypeRef {
  return { kind: "named", name };
}

export const t = {
  named,
  number: named("number"),
  string: named("string"),
  boolean: named("boolean"),
  bigint: named("bigint"),
  null: named("null"),
  unknown: named("unknown"),
  date: named("Date"),
  literal: (...values: LiteralValue[]): TypeRef => ({ kind: "literal", values }),
  array: (element: TypeRef): TypeRef => ({ kind: "array", element }),
  tuple: (...elements: TypeRef[]): TypeRef => ({ kind: "tuple", elements }),
  optional: (inner: TypeRef): TypeRef => ({ kind: "optional", inner }),
  nullable: (inner: TypeRef): TypeRef => ({ kind: "nullable", inner }),
  record: (value: TypeRef): TypeRef => ({ kind: "record", value }),
  map: (key: TypeRef, value: TypeRef): TypeRef => ({ kind: "map", key, value }),
  set: (element: TypeRef): TypeRef => ({ kind: "set", element }),
} as const;

// ============================================================================
// Shapes
// ============================================================================

export interface FieldPlan {
  /** Identifier the constructor or record uses */
  readonly name: string;

  /** Key the field is serialized under */
  readonly key: string;

  /** Declared type; for a variadic field, the element type */
  readonly type: TypeRef;

  /** Present iff the field has a default value */
  readonly default?: () => unknown;

  /** Absent reads as `undefined`; `undefined` is never written */
  readonly optional?: boolean;

  /** Trailing rest parameter, serialized as one array */
  readonly variadic?: boolean;
}

/** A closed set of alternatives, each the name of another shape. */
export interface SumShape {
  readonly kind: "sum";
  readonly name: string;
  readonly variants: readonly string[];
}

/** A zero-field type with exactly one value. */
export interface SingletonShape {
  readonly kind: "singleton";
  readonly name: string;
  readonly tag: string;
  instance(): unknown;
  is(value: unknown): boolean;
}

/**
 * A record of named fields. Without `construct` the value is built as a
 * plain object; without `deconstruct` fields are read as properties.
 */
export interface ProductShape {
  readonly kind: "product";
  readonly name: string;
  readonly tag: string;
  readonly fields: readonly FieldPlan[];
  construct?(...args: unknown[]): unknown;
  deconstruct?(value: unknown): readonly unknown[];
  is?(value: unknown): boolean;
}

export type TypeShape = SumShape | SingletonShape | ProductShape;

export interface PlanOptions {
  /** Reserved key holding a sum alternative's tag (default: "$type") */
  readonly tagKey?: string;

  /** Omit fields whose value writes the same as their default (default: true) */
  readonly omitDefaults?: boolean;
}

export interface DerivationPlan {
  readonly root: string;
  readonly shapes: Readonly<Record<string, TypeShape>>;
  readonly options?: PlanOptions;
}

// ============================================================================
// Builders
// ============================================================================

export interface FieldOptions {
  key?: string;
  default?: () => unknown;
  optional?: boolean;
  variadic?: boolean;
}

export function field(name: string, type: TypeRef, options: FieldOptions = {}): FieldPlan {
  return {
    name,
    key: options.key ?? name,
    type,
    ...(options.default ? { default: options.default } : {}),
    ...(options.optional ? { optional: true } : {}),
    ...(options.variadic ? { variadic: true } : {}),
  };
}

export interface ProductOptions {
  tag?: string;
  construct?(...args: unknown[]): unknown;
  deconstruct?(value: unknown): readonly unknown[];
  is?(value: unknown): boolean;
}

export function product(
  name: string,
  fields: readonly FieldPlan[],
  options: ProductOptions = {},
): ProductShape {
  const { tag, ...hooks } = options;
  return { kind: "product", name, tag: tag ?? name, fields, ...hooks };
}

export function sum(name: string, variants: readonly string[]): SumShape {
  return { kind: "sum", name, variants };
}

export function singleton(
  name: string,
  instance: () => unknown,
  options: { tag?: string; is?(value: unknown): boolean } = {},
): SingletonShape {
  return {
    kind: "singleton",
    name,
    tag: options.tag ?? name,
    instance,
    is: options.is ?? ((value) => value === instance()),
  };
}

/** Assemble shapes into a plan, keyed by shape name. */
export function plan(
  root: string,
  shapes: readonly TypeShape[],
  options?: PlanOptions,
): DerivationPlan {
  const table: Record<string, TypeShape> = {};
  for (const shape of shapes) {
    if (Object.hasOwn(table, shape.name)) {
      throw new Error(`plan: shape '${shape.name}' is listed twice`);
    }
    table[shape.name] = shape;
  }
  return options ? { root, shapes: table, options } : { root, shapes: table };
}
