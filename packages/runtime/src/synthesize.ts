/**
 * Converter synthesis
 *
 * Turns one {@link TypeShape} into a reader/writer pair. Nested named types
 * are obtained through the {@link SynthesisContext}, which is where cycles
 * are broken.
 *
 * Wire format for sum alternatives: the alternative's own object with the
 * tag injected as the first field under the reserved tag key,
 * e.g. `{"$type":"Circle","r":3}`.
 */

import { Tree, defineEntry, type TreeObject } from "./tree.js";
import {
  DuplicateKeyError,
  ExpectedObjectError,
  FieldTypeError,
  InvalidDataError,
  MissingFieldError,
  NoVariantsError,
  UnknownVariantError,
  UnsupportedTypeError,
} from "./errors.js";
import { readWriter, type ReadWriter } from "./readwriter.js";
import type { FieldPlan, ProductShape, SingletonShape, SumShape, TypeRef, TypeShape } from "./plan.js";

export interface SynthesisContext {
  readonly tagKey: string;
  readonly omitDefaults: boolean;

  /** Converter for a named type; may be a forward reference */
  derive(name: string): ReadWriter<unknown>;

  /** Converter for a type reference */
  resolve(ref: TypeRef): ReadWriter<unknown>;

  /** Shape for a type key, if the plan has one */
  shape(name: string): TypeShape | undefined;
}

export function synthesize(shape: TypeShape, ctx: SynthesisContext): ReadWriter<unknown> {
  switch (shape.kind) {
    case "product":
      return synthesizeProduct(shape, ctx);
    case "singleton":
      return synthesizeSingleton(shape);
    case "sum":
      return synthesizeSum(shape, ctx);
  }
}

// ============================================================================
// Products
// ============================================================================

interface BoundField {
  readonly plan: FieldPlan;
  readonly rw: ReadWriter<unknown>;
}

function checkFields(shape: ProductShape): void {
  const seen = new Set<string>();
  shape.fields.forEach((f, i) => {
    if (seen.has(f.key)) throw new DuplicateKeyError(shape.name, f.key, "field");
    seen.add(f.key);
    if (f.variadic && i !== shape.fields.length - 1) {
      throw new UnsupportedTypeError(shape.name, `variadic field \`${f.name}\` is not the last field`);
    }
  });
}

function readProperty(value: unknown, name: string): unknown {
  if (typeof value !== "object" || value === null) {
    throw new TypeError(`Cannot read field '${name}' of ${value === null ? "null" : typeof value}`);
  }
  const out: unknown = Reflect.get(value, name);
  return out;
}

function readField(tree: TreeObject, field: BoundField): unknown {
  const { plan } = field;
  const sub = Tree.get(tree, plan.key);
  if (sub === undefined) {
    if (plan.default) return plan.default();
    if (plan.optional) return undefined;
    throw new MissingFieldError(plan.key);
  }
  try {
    return field.rw.read(sub);
  } catch (error) {
    throw new FieldTypeError(plan.key, error);
  }
}

function construct(shape: ProductShape, args: unknown[]): unknown {
  if (!shape.construct) {
    const out: Record<string, unknown> = {};
    shape.fields.forEach((f, i) => {
      if (args[i] !== undefined) defineEntry(out, f.name, args[i]);
    });
    return out;
  }
  const last = shape.fields[shape.fields.length - 1];
  if (last?.variadic) {
    const rest = args[args.length - 1];
    return shape.construct(...args.slice(0, -1), ...(Array.isArray(rest) ? rest : []));
  }
  return shape.construct(...args);
}

function synthesizeProduct(shape: ProductShape, ctx: SynthesisContext): ReadWriter<unknown> {
  checkFields(shape);
  const fields: BoundField[] = shape.fields.map((plan) => ({
    plan,
    rw: ctx.resolve(plan.variadic ? { kind: "array", element: plan.type } : plan.type),
  }));

  return readWriter(
    (tree) => {
      if (tree.kind !== "object") throw new ExpectedObjectError(shape.name, Tree.describe(tree));
      const node = tree;
      return construct(
        shape,
        fields.map((f) => readField(node, f)),
      );
    },
    (value) => {
      const values = shape.deconstruct
        ? shape.deconstruct(value)
        : fields.map((f) => readProperty(value, f.plan.name));
      const out: Array<readonly [string, Tree]> = [];
      fields.forEach(({ plan, rw }, i) => {
        const v = values[i];
        if (v === undefined && (plan.optional || plan.default)) return;
        const tree = rw.write(v);
        if (ctx.omitDefaults && plan.default && Tree.equals(tree, rw.write(plan.default()))) return;
        out.push([plan.key, tree]);
      });
      return Tree.obj(out);
    },
  );
}

// ============================================================================
// Singletons
// ============================================================================

function synthesizeSingleton(shape: SingletonShape): ReadWriter<unknown> {
  return readWriter(
    () => shape.instance(),
    () => Tree.obj(),
  );
}

// ============================================================================
// Sums
// ============================================================================

interface Leaf {
  readonly name: string;
  readonly tag: string;
  is(value: unknown): boolean;
}

/**
 * Flatten a sum into its leaf alternatives in declaration order. A nested
 * sum contributes its own leaves, so a value is always tagged with the
 * concrete alternative it was built from.
 */
function collectLeaves(
  sum: SumShape,
  ctx: SynthesisContext,
  path: readonly string[] = [],
): Leaf[] {
  if (path.includes(sum.name)) {
    throw new UnsupportedTypeError(sum.name, "a sum cannot list itself as an alternative");
  }
  const leaves: Leaf[] = [];
  for (const name of sum.variants) {
    const variant = ctx.shape(name);
    if (!variant) {
      throw new UnsupportedTypeError(name, `alternative of \`${sum.name}\` has no shape in the plan`);
    }
    switch (variant.kind) {
      case "sum":
        leaves.push(...collectLeaves(variant, ctx, [...path, sum.name]));
        break;
      case "singleton":
        leaves.push({ name, tag: variant.tag, is: (v) => variant.is(v) });
        break;
      case "product": {
        const is = variant.is;
        if (!is) {
          throw new UnsupportedTypeError(
            name,
            `alternative of \`${sum.name}\` has no runtime type test`,
          );
        }
        const clash = variant.fields.find((f) => f.key === ctx.tagKey);
        if (clash) throw new DuplicateKeyError(name, clash.key, "field");
        leaves.push({ name, tag: variant.tag, is: (v) => is.call(variant, v) });
        break;
      }
    }
  }
  return leaves;
}

function synthesizeSum(shape: SumShape, ctx: SynthesisContext): ReadWriter<unknown> {
  const leaves = collectLeaves(shape, ctx);
  if (leaves.length === 0) throw new NoVariantsError(shape.name);

  const byTag = new Map<string, { leaf: Leaf; rw: ReadWriter<unknown> }>();
  for (const leaf of leaves) {
    if (byTag.has(leaf.tag)) throw new DuplicateKeyError(shape.name, leaf.tag, "tag");
    byTag.set(leaf.tag, { leaf, rw: ctx.derive(leaf.name) });
  }
  const entries = Array.from(byTag.values());
  const tagKey = ctx.tagKey;

  return readWriter(
    (tree) => {
      if (tree.kind !== "object") throw new ExpectedObjectError(shape.name, Tree.describe(tree));
      const tagTree = Tree.get(tree, tagKey);
      if (tagTree === undefined) throw new MissingFieldError(tagKey);
      if (tagTree.kind !== "string") {
        throw new FieldTypeError(tagKey, new InvalidDataError("a tag string", Tree.describe(tagTree)));
      }
      const entry = byTag.get(tagTree.value);
      if (!entry) throw new UnknownVariantError(tagTree.value, Array.from(byTag.keys()));
      return entry.rw.read(Tree.without(tree, tagKey));
    },
    (value) => {
      const entry = entries.find(({ leaf }) => leaf.is(value));
      if (!entry) {
        throw new TypeError(`Value is not an alternative of \`${shape.name}\``);
      }
      const tree = entry.rw.write(value);
      if (tree.kind !== "object") {
        throw new TypeError(`Alternative \`${entry.leaf.name}\` did not write an object`);
      }
      return Tree.prepend(tree, tagKey, Tree.str(entry.leaf.tag));
    },
  );
}
