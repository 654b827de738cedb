/**
 * Variant Enumerator
 *
 * Lists the alternatives of a closed union in declaration order, each
 * requested through the walker, and checks that their tags can be told
 * apart on the wire.
 */

import * as ts from "typescript";
import { DuplicateKeyError, NoVariantsError, UnsupportedTypeError } from "@pickler/runtime";
import type { ShapeModel, SumModel } from "./model.js";
import type { PlanWalker } from "./walker.js";

export interface VariantSource {
  readonly type: ts.Type;
  readonly node?: ts.TypeNode;
}

function isNullish(source: VariantSource): boolean {
  return (source.type.flags & (ts.TypeFlags.Undefined | ts.TypeFlags.Void | ts.TypeFlags.Null)) !== 0;
}

/** A written reference the checker could not resolve to anything. */
function isUnresolved(checker: ts.TypeChecker, source: VariantSource): boolean {
  const { node } = source;
  return node !== undefined && ts.isTypeReferenceNode(node) && checker.getSymbolAtLocation(node.typeName) === undefined;
}

/** Leaf shapes under `key`, following nested sums. In-flight shapes are skipped. */
function leaves(walker: PlanWalker, key: string, seen = new Set<string>()): ShapeModel[] {
  if (seen.has(key)) return [];
  seen.add(key);
  const shape = walker.shape(key);
  if (!shape) return [];
  if (shape.kind !== "sum") return [shape];
  return shape.variants.flatMap((v) => leaves(walker, v, seen));
}

function checkTags(walker: PlanWalker, name: string, variants: readonly string[]): void {
  const { tagKey } = walker.env;
  const seen = new Set<string>();

  for (const leaf of variants.flatMap((v) => leaves(walker, v))) {
    if (leaf.kind === "sum") continue;
    if (seen.has(leaf.tag)) throw new DuplicateKeyError(name, leaf.tag, "tag");
    seen.add(leaf.tag);

    if (leaf.kind === "product" && leaf.fields.some((f) => f.key === tagKey)) {
      throw new DuplicateKeyError(leaf.name, tagKey, "field");
    }
  }
}

function derivesFrom(checker: ts.TypeChecker, symbol: ts.Symbol, base: ts.Symbol): boolean {
  const declared = checker.getDeclaredTypeOfSymbol(symbol);
  if (!declared.isClassOrInterface()) return false;
  return checker.getBaseTypes(declared).some((b) => {
    const parent = b.getSymbol();
    return parent !== undefined && (parent === base || derivesFrom(checker, parent, base));
  });
}

/**
 * Order alternatives so a subclass is tested before its base class on
 * write; `instanceof` would otherwise match the base first.
 */
function subclassesFirst(walker: PlanWalker, name: string, variants: readonly string[]): string[] {
  const { checker } = walker;
  const classes = new Map<string, ts.Symbol[]>();
  for (const v of variants) {
    classes.set(
      v,
      leaves(walker, v).flatMap((leaf) => {
        const symbol = walker.typeOf(leaf.name)?.getSymbol();
        return symbol && symbol.flags & ts.SymbolFlags.Class ? [symbol] : [];
      }),
    );
  }
  const precedes = (a: string, b: string): boolean => {
    const bases = classes.get(b) ?? [];
    return (classes.get(a) ?? []).some((cls) => bases.some((base) => cls !== base && derivesFrom(checker, cls, base)));
  };

  const pending = [...variants];
  const ordered: string[] = [];
  while (pending.length > 0) {
    const next = pending.findIndex((v) => !pending.some((u) => u !== v && precedes(u, v)));
    if (next < 0) {
      throw new UnsupportedTypeError(
        name,
        `the alternatives ${pending.map((v) => `\`${v}\``).join(", ")} extend each other's classes both ways; list the classes in one union`,
      );
    }
    ordered.push(...pending.splice(next, 1));
  }
  return ordered;
}

export function enumerateVariants(walker: PlanWalker, name: string, sources: readonly VariantSource[]): SumModel {
  const { checker } = walker;
  const variants: string[] = [];
  let unresolved = 0;

  for (const source of sources) {
    if (isNullish(source)) continue;
    if (isUnresolved(checker, source)) {
      unresolved++;
      continue;
    }
    if (!(source.type.flags & ts.TypeFlags.Object) && !source.type.isUnion()) {
      throw new UnsupportedTypeError(
        name,
        `alternative \`${checker.typeToString(source.type)}\` is not a class, so values of it cannot be recognised`,
      );
    }

    const key = walker.request(source.type, source.node);
    const shape = walker.shape(key);
    if (shape?.kind === "product" && shape.construction.kind === "record") {
      throw new UnsupportedTypeError(
        name,
        `alternative \`${key}\` is an object type; alternatives must be classes so they can be told apart at run time`,
      );
    }
    if (!variants.includes(key)) variants.push(key);
  }

  if (variants.length === 0) {
    throw new NoVariantsError(
      name,
      unresolved > 0 ? `none of the alternatives of \`${name}\` could be resolved` : undefined,
    );
  }

  checkTags(walker, name, variants);
  const ordered = subclassesFirst(walker, name, variants);
  walker.env.log.debug(`sum \`${name}\`: ${ordered.join(", ")}`);
  return { kind: "sum", name, variants: ordered };
}
