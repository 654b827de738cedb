/**
 * Derivation session - the knot binder
 *
 * A session owns one binding cell per type key. Asking for a type that is
 * already bound returns its converter; asking for a type whose synthesis is
 * still running returns the cell itself as a forward reference, which is
 * what lets `Tree = Leaf | Node(children: Tree[])` derive without
 * recursing forever. A failed synthesis removes every cell created since
 * the failing request began, so no half-built converter survives.
 */

import type { ReadWriter } from "./readwriter.js";
import { KnotCell } from "./knot.js";
import { UnsupportedTypeError } from "./errors.js";
import { resolveTypeRef } from "./composite.js";
import { synthesize, type SynthesisContext } from "./synthesize.js";
import { defaultRegistry, type ReadWriterRegistry } from "./registry.js";
import type { DerivationPlan, TypeRef, TypeShape } from "./plan.js";

export const DEFAULT_TAG_KEY = "$type";

export interface SessionOptions {
  /** Converters for named types without a shape (default: `defaultRegistry`) */
  registry?: ReadWriterRegistry;
  tagKey?: string;
  omitDefaults?: boolean;
}

export class DerivationSession implements SynthesisContext {
  readonly tagKey: string;
  readonly omitDefaults: boolean;

  private readonly registry: ReadWriterRegistry;
  private readonly cells = new Map<string, KnotCell>();
  /** Cell keys in creation order, for teardown */
  private readonly created: string[] = [];

  constructor(
    private readonly shapes: Readonly<Record<string, TypeShape>>,
    options: SessionOptions = {},
  ) {
    this.registry = options.registry ?? defaultRegistry;
    this.tagKey = options.tagKey ?? DEFAULT_TAG_KEY;
    this.omitDefaults = options.omitDefaults ?? true;
  }

  /** Open a session over a plan; explicit options win over the plan's own. */
  static fromPlan(plan: DerivationPlan, options: SessionOptions = {}): DerivationSession {
    return new DerivationSession(plan.shapes, {
      registry: options.registry,
      tagKey: options.tagKey ?? plan.options?.tagKey,
      omitDefaults: options.omitDefaults ?? plan.options?.omitDefaults,
    });
  }

  shape(name: string): TypeShape | undefined {
    return Object.hasOwn(this.shapes, name) ? this.shapes[name] : undefined;
  }

  derive(name: string): ReadWriter<unknown> {
    const existing = this.cells.get(name);
    if (existing) {
      return existing.populated ? existing.resolved() : existing;
    }

    const shape = this.shape(name);
    if (!shape) {
      const registered = this.registry.get(name);
      if (registered) return registered;
      throw new UnsupportedTypeError(name, "no shape in the plan and no registered converter");
    }

    const mark = this.created.length;
    const cell = new KnotCell(name);
    this.cells.set(name, cell);
    this.created.push(name);

    try {
      const rw = synthesize(shape, this);
      cell.populate(rw);
      return rw;
    } catch (error) {
      for (const key of this.created.splice(mark)) this.cells.delete(key);
      throw error;
    }
  }

  resolve(ref: TypeRef): ReadWriter<unknown> {
    return resolveTypeRef(ref, (name) => this.derive(name));
  }

  /** Whether a finished converter is bound for `name` */
  isBound(name: string): boolean {
    return this.cells.get(name)?.populated ?? false;
  }

  /** Number of cells, bound or in flight */
  get size(): number {
    return this.cells.size;
  }
}
