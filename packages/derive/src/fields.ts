/**
 * Field Plan Builder
 *
 * Turns constructor parameters (classes) or properties (object types) into
 * ordered field models: serialized key, type reference, default, optional
 * and rest markers.
 */

import * as ts from "typescript";
import { PK9720, PK9721 } from "@pickler/core";
import { DuplicateKeyError, UnsupportedTypeError } from "@pickler/runtime";
import { resolveDefault, resolveKey } from "./annotations.js";
import type { FieldModel } from "./model.js";
import { toTypeRef } from "./typeref.js";
import type { PlanWalker } from "./walker.js";

type Default = Pick<FieldModel, "defaultText" | "optional">;

/**
 * Identifiers an initializer reads. Property names and type annotations
 * are not references.
 */
function referencedIdentifiers(expr: ts.Node): ts.Identifier[] {
  const found: ts.Identifier[] = [];
  const visit = (node: ts.Node): void => {
    if (ts.isTypeNode(node)) return;
    if (ts.isIdentifier(node)) {
      const parent = node.parent;
      const isName =
        (ts.isPropertyAccessExpression(parent) && parent.name === node) ||
        (ts.isPropertyAssignment(parent) && parent.name === node);
      if (!isName) found.push(node);
      return;
    }
    ts.forEachChild(node, visit);
  };
  visit(expr);
  return found;
}

function usesThis(expr: ts.Node): boolean {
  if (expr.kind === ts.SyntaxKind.ThisKeyword) return true;
  return ts.forEachChild(expr, usesThis) ?? false;
}

function parameterDefault(
  walker: PlanWalker,
  owner: string,
  param: ts.ParameterDeclaration,
  name: string,
  siblings: readonly ts.ParameterDeclaration[],
): Default {
  const init = param.initializer;
  if (!init) return param.questionToken ? { optional: true } : {};

  const { checker } = walker;
  const refs = referencedIdentifiers(init);
  const dependsOnParameter =
    usesThis(init) ||
    refs.some((id) => {
      const decl = checker.getSymbolAtLocation(id)?.valueDeclaration;
      return decl !== undefined && ts.isParameter(decl) && siblings.includes(decl);
    });
  if (dependsOnParameter) {
    walker.env.warn(PK9720, { type: owner, field: name });
    return { optional: true };
  }

  const hidden = refs.find((id) => {
    const symbol = checker.getSymbolAtLocation(id);
    if (!symbol) return false;
    const decl = symbol.valueDeclaration;
    const local = decl !== undefined && decl.getSourceFile() === init.getSourceFile() && decl.pos >= init.pos && decl.end <= init.end;
    return !local && walker.localName(symbol) !== id.text;
  });
  if (hidden) {
    walker.env.warn(PK9721, { type: owner, field: name, name: hidden.text });
    return { optional: true };
  }

  return { defaultText: init.getText() };
}

function checkUniqueKeys(owner: string, fields: readonly FieldModel[]): void {
  const seen = new Set<string>();
  for (const field of fields) {
    if (seen.has(field.key)) throw new DuplicateKeyError(owner, field.key, "field");
    seen.add(field.key);
  }
}

/**
 * Fields of a class read through its constructor (or `of` factory)
 * parameters. Types come from the instance's properties where they exist,
 * so generic instantiations see their type arguments.
 *
 * @param generic - whether the owner has type parameters; written types
 *   are then ignored in favour of the instantiated ones
 */
export function buildParameterFields(
  walker: PlanWalker,
  owner: string,
  params: readonly ts.ParameterDeclaration[],
  instance: ts.Type,
  generic: boolean,
): FieldModel[] {
  const { checker } = walker;

  const fields = params.map((param): FieldModel => {
    if (!ts.isIdentifier(param.name)) {
      throw new UnsupportedTypeError(owner, "destructured constructor parameters cannot be serialized");
    }
    const name = param.name.text;
    const key = resolveKey(param, name, owner);
    const node = generic ? undefined : param.type;

    if (param.dotDotDotToken) {
      const ref = toTypeRef(walker, owner, checker.getTypeAtLocation(param), node);
      if (ref.kind !== "array") {
        throw new UnsupportedTypeError(owner, `rest parameter \`${name}\` must have an array type`);
      }
      return { name, key, type: ref.element, variadic: true };
    }

    const declared = checker.getTypeOfPropertyOfType(instance, name) ?? checker.getTypeAtLocation(param);
    const absent = parameterDefault(walker, owner, param, name, params);
    const ref = toTypeRef(walker, owner, declared, node);
    const type = absent.optional && ref.kind === "optional" ? ref.inner : ref;
    return { name, key, type, ...absent };
  });

  checkUniqueKeys(owner, fields);
  return fields;
}

function isMethod(decl: ts.Declaration): boolean {
  return ts.isMethodSignature(decl) || ts.isMethodDeclaration(decl);
}

/** Fields of an interface or object type, in declaration order. */
export function buildPropertyFields(walker: PlanWalker, owner: string, type: ts.Type, generic: boolean): FieldModel[] {
  const { checker } = walker;
  const fields: FieldModel[] = [];

  for (const prop of checker.getPropertiesOfType(type)) {
    const decl = prop.valueDeclaration ?? prop.declarations?.[0];
    if (decl && isMethod(decl)) continue;

    const name = prop.name;
    const key = decl ? resolveKey(decl, name, owner) : name;
    const defaultText = decl ? resolveDefault(decl, owner, name) : undefined;
    const optional = (prop.flags & ts.SymbolFlags.Optional) !== 0 && defaultText === undefined;
    const node =
      !generic && decl && (ts.isPropertySignature(decl) || ts.isPropertyDeclaration(decl)) ? decl.type : undefined;

    const declared = checker.getTypeOfPropertyOfType(type, name) ?? checker.getTypeOfSymbolAtLocation(prop, walker.env.site);
    const ref = toTypeRef(walker, owner, declared, node);
    const unwrapped = (optional || defaultText !== undefined) && ref.kind === "optional" ? ref.inner : ref;

    fields.push({
      name,
      key,
      type: unwrapped,
      ...(defaultText !== undefined ? { defaultText } : {}),
      ...(optional ? { optional: true } : {}),
    });
  }

  checkUniqueKeys(owner, fields);
  return fields;
}
