/**
 * Type references
 *
 * Maps a field's declared type to the TypeRef the runtime resolves:
 * primitives and library classes by name, containers structurally, and
 * everything else through the walker as a named shape.
 */

import * as ts from "typescript";
import { t, UnsupportedTypeError, type LiteralValue, type TypeRef } from "@pickler/runtime";
import { unionAliasDeclaration, referencedAlias, type PlanWalker } from "./walker.js";

const ARRAYS = new Set(["Array", "ReadonlyArray"]);
const MAPS = new Set(["Map", "ReadonlyMap"]);
const SETS = new Set(["Set", "ReadonlySet"]);

function isObjectType(type: ts.Type): type is ts.ObjectType {
  return (type.flags & ts.TypeFlags.Object) !== 0;
}

function isTypeReference(type: ts.ObjectType): type is ts.TypeReference {
  return (type.objectFlags & ts.ObjectFlags.Reference) !== 0;
}

function isTuple(type: ts.TypeReference): boolean {
  return (type.target.objectFlags & ts.ObjectFlags.Tuple) !== 0;
}

function isNullish(type: ts.Type): boolean {
  return (type.flags & (ts.TypeFlags.Undefined | ts.TypeFlags.Void | ts.TypeFlags.Null)) !== 0;
}

function literalValue(checker: ts.TypeChecker, type: ts.Type): LiteralValue | undefined {
  if (type.isStringLiteral() || type.isNumberLiteral()) return type.value;
  if (type.flags & ts.TypeFlags.BooleanLiteral) return checker.typeToString(type) === "true";
  return undefined;
}

/** Wrap `inner` for the `null` and `undefined` members a union dropped. */
function wrap(inner: TypeRef, nullable: boolean, optional: boolean): TypeRef {
  const withNull = nullable ? t.nullable(inner) : inner;
  return optional ? t.optional(withNull) : withNull;
}

/**
 * Literal members of a union as one literal reference; `true | false`
 * alone stays `boolean`. Undefined when a member is not a literal.
 */
function literalUnion(checker: ts.TypeChecker, members: readonly ts.Type[]): TypeRef | undefined {
  const values: LiteralValue[] = [];
  for (const member of members) {
    const value = literalValue(checker, member);
    if (value === undefined) return undefined;
    values.push(value);
  }
  if (values.length === 2 && values.every((v) => typeof v === "boolean")) return t.boolean;
  return t.literal(...values);
}

function fromUnionNode(walker: PlanWalker, owner: string, node: ts.UnionTypeNode): TypeRef {
  const { checker } = walker;
  const rest: ts.TypeNode[] = [];
  let nullable = false;
  let optional = false;

  for (const member of node.types) {
    const type = checker.getTypeFromTypeNode(member);
    if (type.flags & ts.TypeFlags.Null) nullable = true;
    else if (isNullish(type)) optional = true;
    else rest.push(member);
  }

  if (rest.length === 1) {
    return wrap(toTypeRef(walker, owner, checker.getTypeFromTypeNode(rest[0]), rest[0]), nullable, optional);
  }

  const literals = literalUnion(
    checker,
    rest.map((m) => checker.getTypeFromTypeNode(m)),
  );
  if (!literals) {
    throw new UnsupportedTypeError(
      owner,
      `the inline union \`${node.getText()}\` has no tag to tell its members apart; declare a type alias for it`,
    );
  }
  return wrap(literals, nullable, optional);
}

/** Syntax-directed cases: written unions and union aliases. */
function fromNode(walker: PlanWalker, owner: string, node: ts.TypeNode): TypeRef | undefined {
  const { checker } = walker;
  if (ts.isParenthesizedTypeNode(node)) return fromNode(walker, owner, node.type);
  if (ts.isUnionTypeNode(node)) return fromUnionNode(walker, owner, node);
  if (ts.isArrayTypeNode(node)) {
    const element = node.elementType;
    return t.array(toTypeRef(walker, owner, checker.getTypeFromTypeNode(element), element));
  }
  if (unionAliasDeclaration(checker, referencedAlias(checker, node))) {
    return t.named(walker.request(checker.getTypeFromTypeNode(node), node));
  }
  return undefined;
}

function fromUnionType(walker: PlanWalker, owner: string, type: ts.UnionType): TypeRef {
  const { checker } = walker;
  if (unionAliasDeclaration(checker, type.aliasSymbol)) {
    return t.named(walker.request(type));
  }

  const rest = type.types.filter((m) => !isNullish(m));
  const nullable = type.types.some((m) => (m.flags & ts.TypeFlags.Null) !== 0);
  const optional = type.types.some((m) => (m.flags & (ts.TypeFlags.Undefined | ts.TypeFlags.Void)) !== 0);

  if (rest.length === 1) return wrap(toTypeRef(walker, owner, rest[0]), nullable, optional);

  const literals = literalUnion(checker, rest);
  if (!literals) {
    throw new UnsupportedTypeError(
      owner,
      `the union \`${checker.typeToString(type)}\` has no tag to tell its members apart; declare a type alias for it`,
    );
  }
  return wrap(literals, nullable, optional);
}

function fromObjectType(walker: PlanWalker, owner: string, type: ts.ObjectType, node?: ts.TypeNode): TypeRef {
  const { checker } = walker;
  const text = checker.typeToString(type);

  if (type.getCallSignatures().length > 0 || type.getConstructSignatures().length > 0) {
    throw new UnsupportedTypeError(owner, `\`${text}\` is a function type`);
  }

  const symbol = type.getSymbol();
  const name = symbol?.name ?? "";

  if (isTypeReference(type)) {
    const args = checker.getTypeArguments(type);
    if (isTuple(type)) return t.tuple(...args.map((a) => toTypeRef(walker, owner, a)));
    if (ARRAYS.has(name) && args.length === 1) return t.array(toTypeRef(walker, owner, args[0]));
    if (MAPS.has(name) && args.length === 2) {
      return t.map(toTypeRef(walker, owner, args[0]), toTypeRef(walker, owner, args[1]));
    }
    if (SETS.has(name) && args.length === 1) return t.set(toTypeRef(walker, owner, args[0]));
  }

  if (name === "Date") return t.date;

  const index = type.getStringIndexType();
  if (index && type.getProperties().length === 0) {
    return t.record(toTypeRef(walker, owner, index));
  }

  // Library classes are looked up by name in the converter registry
  if (symbol && walker.isLibrarySymbol(symbol)) return t.named(text);

  return t.named(walker.request(type, node));
}

/**
 * Reference to `type` for a field of `owner`. `node` is the written type,
 * when it can be trusted to agree with `type`.
 */
export function toTypeRef(walker: PlanWalker, owner: string, type: ts.Type, node?: ts.TypeNode): TypeRef {
  const { checker } = walker;

  if (node) {
    const ref = fromNode(walker, owner, node);
    if (ref) return ref;
  }

  const flags = type.flags;
  if (flags & (ts.TypeFlags.Any | ts.TypeFlags.Unknown)) return t.unknown;
  if (flags & ts.TypeFlags.Boolean) return t.boolean;
  if (flags & ts.TypeFlags.Number) return t.number;
  if (flags & ts.TypeFlags.String) return t.string;
  if (flags & ts.TypeFlags.BigIntLike) return t.bigint;
  if (flags & ts.TypeFlags.Null) return t.null;
  if (flags & (ts.TypeFlags.Undefined | ts.TypeFlags.Void)) return t.named("undefined");

  const literal = literalValue(checker, type);
  if (literal !== undefined) return t.literal(literal);

  if (type.isUnion()) return fromUnionType(walker, owner, type);

  if (flags & ts.TypeFlags.TypeParameter) {
    throw new UnsupportedTypeError(owner, `type parameter \`${checker.typeToString(type)}\` has no known shape`);
  }
  if (type.isIntersection()) {
    throw new UnsupportedTypeError(owner, `intersection \`${checker.typeToString(type)}\` cannot be serialized`);
  }
  if (isObjectType(type)) return fromObjectType(walker, owner, type, node);

  throw new UnsupportedTypeError(owner, `\`${checker.typeToString(type)}\` has no tree form`);
}
