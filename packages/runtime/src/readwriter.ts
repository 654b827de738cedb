/**
 * Reader / Writer contracts
 */

import type { Tree } from "./tree.js";
import { ConversionError, InvalidDataError } from "./errors.js";
import { Tree as T } from "./tree.js";

export interface Reader<A> {
  read(tree: Tree): A;
}

export interface Writer<A> {
  write(value: A): Tree;
}

/** A converter pair: one reader and one writer for the same type. */
export interface ReadWriter<A> extends Reader<A>, Writer<A> {}

export function readWriter<A>(read: (tree: Tree) => A, write: (value: A) => Tree): ReadWriter<A> {
  return { read, write };
}

/**
 * Wrap a partial reader so that any failure other than a conversion error
 * (a `TypeError` from a mismatched shape, a `RangeError` from a parser)
 * surfaces as an `InvalidDataError` naming what was expected.
 *
 * @example
 * ```typescript
 * const hex = validate("a hex colour", (tree) => {
 *   if (tree.kind !== "string" || !/^#[0-9a-f]{6}$/i.test(tree.value)) throw new TypeError();
 *   return tree.value;
 * });
 * ```
 */
export function validate<A>(expected: string, read: (tree: Tree) => A): (tree: Tree) => A {
  return (tree) => {
    try {
      return read(tree);
    } catch (error) {
      if (error instanceof ConversionError) throw error;
      throw new InvalidDataError(expected, T.describe(tree), { cause: error });
    }
  };
}
