/**
 * Annotation Resolver
 *
 * Reads serialized names from `@key("...")` decorators (classes, parameters,
 * properties) and from JSDoc `@key "..."` tags (interfaces, type aliases and
 * their members), and literal `@default` values from JSDoc. Only literals
 * are accepted; nothing is evaluated.
 */

import * as ts from "typescript";
import { decoratorArguments, decoratorName } from "@pickler/core";
import { MalformedAnnotationError, UnsupportedTypeError } from "@pickler/runtime";

const KEY = "key";
const DEFAULT = "default";

function keyDecorators(node: ts.Node): readonly ts.Decorator[] {
  if (!ts.canHaveDecorators(node)) return [];
  return (ts.getDecorators(node) ?? []).filter((d) => decoratorName(d) === KEY);
}

function jsDocTags(node: ts.Node, name: string): readonly ts.JSDocTag[] {
  // Parameter tags belong to the enclosing function's comment
  if (ts.isParameter(node)) return [];
  return ts.getJSDocTags(node).filter((tag) => tag.tagName.text === name);
}

function literalArgument(decorator: ts.Decorator, owner: string): string {
  const args = decoratorArguments(decorator);
  if (args.length !== 1) {
    throw new MalformedAnnotationError(owner, `expected one string argument, found ${args.length}`);
  }
  const [arg] = args;
  if (!ts.isStringLiteral(arg) && !ts.isNoSubstitutionTemplateLiteral(arg)) {
    throw new MalformedAnnotationError(owner, `expected a string literal, found \`${arg.getText()}\``);
  }
  return arg.text;
}

const QUOTED = /^\s*(?:"([^"\\]*)"|'([^'\\]*)')\s*$/;

function quotedComment(tag: ts.JSDocTag, owner: string): string {
  const text = ts.getTextOfJSDocComment(tag.comment) ?? "";
  const match = QUOTED.exec(text);
  if (!match) {
    throw new MalformedAnnotationError(owner, `expected one quoted string after @key, found \`${text.trim()}\``);
  }
  return match[1] ?? match[2];
}

/**
 * The serialized name declared on `node`, or `fallback` when it has none.
 *
 * @param owner - type the annotation belongs to, for error messages
 */
export function resolveKey(node: ts.Node, fallback: string, owner: string): string {
  const decorators = keyDecorators(node);
  const tags = jsDocTags(node, KEY);
  if (decorators.length + tags.length > 1) {
    throw new MalformedAnnotationError(owner, "a declaration may carry only one key annotation");
  }

  const resolved =
    decorators.length === 1
      ? literalArgument(decorators[0], owner)
      : tags.length === 1
        ? quotedComment(tags[0], owner)
        : undefined;

  if (resolved === undefined) return fallback;
  if (resolved === "") {
    throw new MalformedAnnotationError(owner, "the key must not be empty");
  }
  return resolved;
}

function isLiteralExpression(expr: ts.Expression): boolean {
  if (ts.isParenthesizedExpression(expr)) return isLiteralExpression(expr.expression);
  if (ts.isStringLiteral(expr) || ts.isNumericLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) {
    return true;
  }
  switch (expr.kind) {
    case ts.SyntaxKind.TrueKeyword:
    case ts.SyntaxKind.FalseKeyword:
    case ts.SyntaxKind.NullKeyword:
      return true;
  }
  if (ts.isPrefixUnaryExpression(expr)) {
    return expr.operator === ts.SyntaxKind.MinusToken && ts.isNumericLiteral(expr.operand);
  }
  if (ts.isArrayLiteralExpression(expr)) {
    return expr.elements.every(isLiteralExpression);
  }
  if (ts.isObjectLiteralExpression(expr)) {
    return expr.properties.every(
      (p) =>
        ts.isPropertyAssignment(p) &&
        (ts.isIdentifier(p.name) || ts.isStringLiteral(p.name)) &&
        isLiteralExpression(p.initializer),
    );
  }
  return false;
}

/**
 * Source text of a JSDoc `@default` on a record member, if it has one.
 * The text must be a JSON-like literal.
 */
export function resolveDefault(node: ts.Node, owner: string, field: string): string | undefined {
  const tags = jsDocTags(node, DEFAULT);
  if (tags.length === 0) return undefined;

  const text = (ts.getTextOfJSDocComment(tags[0].comment) ?? "").trim();
  const parsed = ts.createSourceFile("__default__.ts", `(${text});`, ts.ScriptTarget.Latest, true);
  const [statement] = parsed.statements;
  const { diagnostics = [] } = ts.transpileModule(`(${text});`, { reportDiagnostics: true });
  if (
    text === "" ||
    diagnostics.length > 0 ||
    parsed.statements.length !== 1 ||
    !ts.isExpressionStatement(statement) ||
    !isLiteralExpression(statement.expression)
  ) {
    throw new UnsupportedTypeError(owner, `the @default of \`${field}\` must be a literal, found \`${text}\``);
  }
  return text;
}
