/**
 * Type Shape Classifier
 *
 * Decides whether a type is a sum (a union alias), a singleton, a class
 * product or a record product, and gathers what the converter needs to
 * build and take apart its values.
 */

import * as ts from "typescript";
import {
  NoConstructorError,
  NoDeconstructorError,
  NoVariantsError,
  NotSealedError,
  UnsupportedTypeError,
} from "@pickler/runtime";
import { resolveKey } from "./annotations.js";
import { buildParameterFields, buildPropertyFields } from "./fields.js";
import type { Construction, ProductModel, ShapeModel, SingletonModel } from "./model.js";
import { enumerateVariants, type VariantSource } from "./variants.js";
import { referencedAlias, unionAliasDeclaration, type PlanWalker } from "./walker.js";

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  return ts.canHaveModifiers(node) && (ts.getModifiers(node) ?? []).some((m) => m.kind === kind);
}

function isHidden(node: ts.Node): boolean {
  return hasModifier(node, ts.SyntaxKind.PrivateKeyword) || hasModifier(node, ts.SyntaxKind.ProtectedKeyword);
}

/** Class name prefixed with its enclosing namespaces. */
function qualifiedName(decl: ts.ClassDeclaration, name: string): string {
  const parts = [name];
  let block: ts.Node = decl.parent;
  while (ts.isModuleBlock(block)) {
    const ns = block.parent;
    parts.unshift(ns.name.text);
    block = ns.parent;
  }
  return parts.join(".");
}

// ============================================================================
// Sums
// ============================================================================

/** Members of the union `type` stands for, if it is one. */
function unionMembers(walker: PlanWalker, type: ts.Type, node?: ts.TypeNode): VariantSource[] | undefined {
  const { checker } = walker;

  const aliasSymbol = referencedAlias(checker, node) ?? type.aliasSymbol;
  const alias = unionAliasDeclaration(checker, aliasSymbol);
  if (alias) {
    if (alias.typeParameters) {
      throw new UnsupportedTypeError(
        alias.name.text,
        "generic union aliases cannot be derived; declare a union of concrete classes",
      );
    }
    let body = alias.type;
    while (ts.isParenthesizedTypeNode(body)) body = body.type;
    if (!ts.isUnionTypeNode(body)) return undefined;
    return body.types.map((member) => ({ type: checker.getTypeFromTypeNode(member), node: member }));
  }

  if (node && ts.isUnionTypeNode(node)) {
    return node.types.map((member) => ({ type: checker.getTypeFromTypeNode(member), node: member }));
  }

  // An inline union of classes, e.g. `deriveReadWriter<Circle | Square>()`
  if (type.isUnion() && !(type.flags & ts.TypeFlags.Boolean)) {
    const members = type.types.filter((m) => !(m.flags & (ts.TypeFlags.Undefined | ts.TypeFlags.Null)));
    if (members.every((m) => (m.getSymbol()?.flags ?? 0) & ts.SymbolFlags.Class)) {
      return members.map((member) => ({ type: member }));
    }
  }

  return undefined;
}

// ============================================================================
// Classes
// ============================================================================

function constructorParameters(signature: ts.Signature | undefined): readonly ts.ParameterDeclaration[] {
  const decl = signature?.declaration;
  return decl && (ts.isConstructorDeclaration(decl) || ts.isMethodDeclaration(decl)) ? decl.parameters : [];
}

/** Public static member of the class side named `name`. */
function staticMember(checker: ts.TypeChecker, classType: ts.Type, name: string): ts.Symbol | undefined {
  const member = checker.getPropertyOfType(classType, name);
  const decl = member?.valueDeclaration;
  return member && decl && !isHidden(decl) ? member : undefined;
}

function singletonMember(
  checker: ts.TypeChecker,
  classType: ts.Type,
  symbol: ts.Symbol,
): string | undefined {
  for (const prop of checker.getPropertiesOfType(classType)) {
    const decl = prop.valueDeclaration;
    if (prop.name === "prototype" || !decl || !ts.isPropertyDeclaration(decl) || isHidden(decl)) continue;
    if (checker.getTypeOfSymbolAtLocation(prop, decl).getSymbol() === symbol) return prop.name;
  }
  return undefined;
}

/**
 * The `of` factory standing in for a private constructor: a public static
 * method with one signature that returns the class.
 */
function factorySignature(
  checker: ts.TypeChecker,
  classType: ts.Type,
  symbol: ts.Symbol,
): ts.Signature | undefined {
  const of = staticMember(checker, classType, "of");
  const decl = of?.valueDeclaration;
  if (!of || !decl || !ts.isMethodDeclaration(decl)) return undefined;
  const signatures = checker.getTypeOfSymbolAtLocation(of, decl).getCallSignatures();
  if (signatures.length !== 1) return undefined;
  return checker.getReturnTypeOfSignature(signatures[0]).getSymbol() === symbol ? signatures[0] : undefined;
}

function classifyClass(walker: PlanWalker, type: ts.Type, symbol: ts.Symbol, key: string): ShapeModel {
  const { checker } = walker;

  const decl = symbol.declarations?.find(ts.isClassDeclaration);
  if (!decl) throw new UnsupportedTypeError(key, "class expressions cannot be derived");
  if (hasModifier(decl, ts.SyntaxKind.AbstractKeyword)) throw new NotSealedError(key);

  const tag = resolveKey(decl, qualifiedName(decl, symbol.name), key);
  const target = walker.accessPath(symbol);
  if (!target) {
    throw new UnsupportedTypeError(
      key,
      `\`${symbol.name}\` is not in scope where the converter is derived; import it there`,
    );
  }

  const classType = checker.getTypeOfSymbolAtLocation(symbol, decl);
  const signatures = classType.getConstructSignatures();
  if (signatures.length > 1) {
    throw new UnsupportedTypeError(key, "overloaded constructors are not supported");
  }
  const ctor = signatures[0]?.declaration;
  const ctorParams = constructorParameters(signatures[0]);

  if (ctorParams.length === 0) {
    const member = singletonMember(checker, classType, symbol);
    if (member) {
      const singleton: SingletonModel = { kind: "singleton", name: key, tag, target, member };
      return singleton;
    }
  }

  let construction: Construction = { kind: "new", target };
  let params = ctorParams;
  if (ctor && isHidden(ctor)) {
    const factory = factorySignature(checker, classType, symbol);
    if (!factory) throw new NoConstructorError(key);
    construction = { kind: "factory", target };
    params = constructorParameters(factory);
  }

  const generic = decl.typeParameters !== undefined;
  const fields = buildParameterFields(walker, key, params, type, generic);

  const unapply = staticMember(checker, classType, "unapply") !== undefined;
  if (!unapply) {
    for (const field of fields) {
      const prop = checker.getPropertyOfType(type, field.name);
      const propDecl = prop?.valueDeclaration;
      if (!prop || !propDecl || isHidden(propDecl) || ts.isMethodDeclaration(propDecl)) {
        throw new NoDeconstructorError(key, field.name);
      }
    }
  }

  const product: ProductModel = { kind: "product", name: key, tag, fields, construction, unapply };
  return product;
}

// ============================================================================
// Records
// ============================================================================

function classifyRecord(walker: PlanWalker, type: ts.Type, symbol: ts.Symbol, key: string): ShapeModel {
  const decl = symbol.declarations?.[0];
  const generic =
    decl !== undefined &&
    (ts.isInterfaceDeclaration(decl) || ts.isTypeAliasDeclaration(decl)) &&
    decl.typeParameters !== undefined;
  const owner = decl && ts.isTypeLiteralNode(decl) && ts.isTypeAliasDeclaration(decl.parent) ? decl.parent : decl;

  const product: ProductModel = {
    kind: "product",
    name: key,
    tag: owner ? resolveKey(owner, key, key) : key,
    fields: buildPropertyFields(walker, key, type, generic),
    construction: { kind: "record" },
    unapply: false,
  };
  return product;
}

// ============================================================================
// Entry point
// ============================================================================

function describeUnsupported(checker: ts.TypeChecker, type: ts.Type): string {
  if (type.flags & ts.TypeFlags.TypeParameter) return "generic type parameters have no known shape";
  if (type.isIntersection()) return "intersections cannot be derived";
  if (type.getCallSignatures().length > 0) return "functions have no tree form";
  if (type.flags & (ts.TypeFlags.Primitive | ts.TypeFlags.Literal)) {
    return `\`${checker.typeToString(type)}\` is a leaf type; derive converters for classes, object types or union aliases`;
  }
  return "only classes, object types and closed unions can be derived";
}

/**
 * Classify `type` (reached through `node`, when written) into the shape
 * stored under `key`.
 */
export function classify(walker: PlanWalker, type: ts.Type, node: ts.TypeNode | undefined, key: string): ShapeModel {
  const { checker } = walker;

  if (type.flags & ts.TypeFlags.Never) {
    throw new NoVariantsError(key, `\`${key}\` resolved to \`never\``);
  }

  const members = unionMembers(walker, type, node);
  if (members) return enumerateVariants(walker, key, members);

  const symbol = type.getSymbol();
  if (symbol && walker.isLibrarySymbol(symbol)) {
    throw new UnsupportedTypeError(key, "it is declared in a library; register a converter for it by name");
  }
  if (symbol && symbol.flags & ts.SymbolFlags.Class) {
    return classifyClass(walker, type, symbol, key);
  }

  const isObjectType =
    (type.flags & ts.TypeFlags.Object) !== 0 &&
    type.getCallSignatures().length === 0 &&
    type.getConstructSignatures().length === 0;
  if (symbol && isObjectType && symbol.flags & (ts.SymbolFlags.Interface | ts.SymbolFlags.TypeLiteral)) {
    return classifyRecord(walker, type, symbol, key);
  }

  throw new UnsupportedTypeError(key, describeUnsupported(checker, type));
}
