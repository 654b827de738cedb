/**
 * Converters for the built-in leaf types. Derived converters reach these
 * through a {@link ReadWriterRegistry} by type name.
 */

import { Tree, fromJson, toJson } from "./tree.js";
import { InvalidDataError } from "./errors.js";
import { readWriter, validate, type ReadWriter } from "./readwriter.js";

function mismatch(expected: string, tree: Tree): InvalidDataError {
  return new InvalidDataError(expected, Tree.describe(tree));
}

const NON_FINITE = new Map([
  ["NaN", NaN],
  ["Infinity", Infinity],
  ["-Infinity", -Infinity],
]);

/** Non-finite numbers have no JSON literal; they are written as the strings "NaN", "Infinity" and "-Infinity". */
export const numberRW: ReadWriter<number> = readWriter(
  (tree) => {
    if (tree.kind === "number") return tree.value;
    const special = tree.kind === "string" ? NON_FINITE.get(tree.value) : undefined;
    if (special === undefined) throw mismatch("a number", tree);
    return special;
  },
  (value) => (Number.isFinite(value) ? Tree.num(value) : Tree.str(String(value))),
);

export const stringRW: ReadWriter<string> = readWriter(
  (tree) => {
    if (tree.kind !== "string") throw mismatch("a string", tree);
    return tree.value;
  },
  (value) => Tree.str(value),
);

export const booleanRW: ReadWriter<boolean> = readWriter(
  (tree) => {
    if (tree.kind !== "boolean") throw mismatch("a boolean", tree);
    return tree.value;
  },
  (value) => Tree.bool(value),
);

export const nullRW: ReadWriter<null> = readWriter(
  (tree) => {
    if (tree.kind !== "null") throw mismatch("null", tree);
    return null;
  },
  () => Tree.nul(),
);

export const undefinedRW: ReadWriter<undefined> = readWriter(
  (tree) => {
    if (tree.kind !== "null") throw mismatch("null", tree);
    return undefined;
  },
  () => Tree.nul(),
);

/** Any JSON value, passed through unchanged. */
export const unknownRW: ReadWriter<unknown> = readWriter(toJson, fromJson);

/** Written as a decimal string so values beyond 2^53 survive the text form. */
export const bigintRW: ReadWriter<bigint> = readWriter(
  validate("a decimal integer string", (tree) => {
    if (tree.kind !== "string") throw mismatch("a decimal integer string", tree);
    return BigInt(tree.value);
  }),
  (value) => Tree.str(value.toString()),
);

/** Written as an ISO-8601 string. */
export const dateRW: ReadWriter<Date> = readWriter(
  (tree) => {
    if (tree.kind !== "string") throw mismatch("an ISO-8601 date string", tree);
    const date = new Date(tree.value);
    if (Number.isNaN(date.getTime())) throw mismatch("an ISO-8601 date string", tree);
    return date;
  },
  (value) => Tree.str(value.toISOString()),
);

export const PRIMITIVES: ReadonlyArray<readonly [string, ReadWriter<unknown>]> = [
  ["number", numberRW],
  ["string", stringRW],
  ["boolean", booleanRW],
  ["null", nullRW],
  ["undefined", undefinedRW],
  ["unknown", unknownRW],
  ["bigint", bigintRW],
  ["Date", dateRW],
];
