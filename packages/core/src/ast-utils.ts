/**
 * Shared AST utility functions for macro implementations.
 */

import * as ts from "typescript";

// =============================================================================
// stripDecorator: Remove a specific decorator from a declaration
// =============================================================================

/**
 * Strip a decorator from a declaration, preserving other decorators and
 * modifiers.
 *
 * Handles: ClassDeclaration, MethodDeclaration, PropertyDeclaration,
 * ParameterDeclaration. Any other node is returned unchanged.
 */
export function stripDecorator(
  factory: ts.NodeFactory,
  target: ts.Node,
  decoratorToRemove: ts.Decorator,
): ts.Node {
  if (!ts.canHaveDecorators(target)) return target;

  const existingDecorators = ts.getDecorators(target);
  if (!existingDecorators) return target;

  const remaining = existingDecorators.filter((d) => d !== decoratorToRemove);
  const existingModifiers = ts.canHaveModifiers(target) ? ts.getModifiers(target) : undefined;
  const modifiers = [...remaining, ...(existingModifiers ?? [])];
  const newModifiers = modifiers.length > 0 ? modifiers : undefined;

  if (ts.isClassDeclaration(target)) {
    return factory.updateClassDeclaration(
      target,
      newModifiers,
      target.name,
      target.typeParameters,
      target.heritageClauses,
      target.members,
    );
  }

  if (ts.isMethodDeclaration(target)) {
    return factory.updateMethodDeclaration(
      target,
      newModifiers,
      target.asteriskToken,
      target.name,
      target.questionToken,
      target.typeParameters,
      target.parameters,
      target.type,
      target.body,
    );
  }

  if (ts.isPropertyDeclaration(target)) {
    return factory.updatePropertyDeclaration(
      target,
      newModifiers,
      target.name,
      target.questionToken ?? target.exclamationToken,
      target.type,
      target.initializer,
    );
  }

  if (ts.isParameter(target)) {
    return factory.updateParameterDeclaration(
      target,
      newModifiers,
      target.dotDotDotToken,
      target.name,
      target.questionToken,
      target.type,
      target.initializer,
    );
  }

  return target;
}

// =============================================================================
// stripPositions: Mark AST nodes as synthetic
// =============================================================================

/**
 * Recursively mark AST nodes as synthetic by setting positions to -1, so
 * the printer generates fresh text instead of slicing it from whichever
 * source file the node was parsed from.
 */
export function stripPositions<T extends ts.Node>(node: T): T {
  ts.setTextRange(node, { pos: -1, end: -1 });
  return ts.visitEachChild(
    node,
    (child) => stripPositions(child),
    ts.nullTransformationContext,
  ) as T;
}

// =============================================================================
// Decorator helpers
// =============================================================================

/**
 * Name a decorator is written under: `key` for `@key(...)` and `@key`,
 * `key` for `@pk.key(...)`.
 */
export function decoratorName(decorator: ts.Decorator): string | undefined {
  const expr = ts.isCallExpression(decorator.expression)
    ? decorator.expression.expression
    : decorator.expression;
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isPropertyAccessExpression(expr)) return expr.name.text;
  return undefined;
}

/** Arguments of a decorator call; empty for a bare `@name`. */
export function decoratorArguments(decorator: ts.Decorator): readonly ts.Expression[] {
  return ts.isCallExpression(decorator.expression) ? decorator.expression.arguments : [];
}
