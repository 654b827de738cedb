/**
 * User-facing entry points
 *
 * `deriveReadWriter<T>()` and `@key(...)` are placeholders: the pickler
 * transformer fills in the derivation plan for `deriveReadWriter` and strips
 * `@key` decorators. Without the transformer, `deriveReadWriter` fails
 * loudly and `fromPlan` takes a hand-written plan instead.
 */

import type { ReadWriter } from "./readwriter.js";
import type { DerivationPlan } from "./plan.js";
import { PicklerError } from "./errors.js";
import { DerivationSession, type SessionOptions } from "./session.js";
import { parse, stringify } from "./tree.js";

export type DeriveOptions = SessionOptions;

/**
 * Build a converter from a plan. The plan must describe `T`; nothing checks
 * that at run time.
 */
export function fromPlan<T>(plan: DerivationPlan, options?: DeriveOptions): ReadWriter<T> {
  const rw = DerivationSession.fromPlan(plan, options).derive(plan.root);
  return rw as ReadWriter<T>;
}

/**
 * Derive a reader/writer pair for `T` at build time.
 *
 * @example
 * ```typescript
 * type Shape = Circle | Square;
 * const shapeRW = deriveReadWriter<Shape>();
 * writeJson(shapeRW, new Circle(3)); // '{"$type":"Circle","r":3}'
 * ```
 */
export function deriveReadWriter<T>(options?: DeriveOptions, plan?: DerivationPlan): ReadWriter<T> {
  if (!plan) {
    throw new PicklerError(
      "deriveReadWriter<T>() was called without a derivation plan; " +
        "the pickler transformer did not run on this file",
    );
  }
  return fromPlan<T>(plan, options);
}

/**
 * Serialize a class, constructor parameter or property under a different
 * key. For a sum alternative this also sets its tag.
 *
 * Parameter decorators need `experimentalDecorators`; the transformer
 * removes every `@key` before emit.
 */
export function key(_name: string): (..._target: unknown[]) => void {
  return () => {};
}

export function readJson<T>(reader: ReadWriter<T>, text: string): T {
  return reader.read(parse(text));
}

export function writeJson<T>(writer: ReadWriter<T>, value: T): string {
  return stringify(writer.write(value));
}
