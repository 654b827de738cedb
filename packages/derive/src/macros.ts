/**
 * Macros
 *
 * `deriveReadWriter<T>()` gains the derivation plan for `T` as its second
 * argument; `@key("...")` is checked and removed. Both are only expanded
 * when imported from the runtime package.
 */

import * as ts from "typescript";
import {
  config,
  createLogger,
  decoratorName,
  defineAttributeMacro,
  defineExpressionMacro,
  getDiagnosticDescriptor,
  PK9707,
  PK9799,
  stripDecorator,
  type MacroContext,
} from "@pickler/core";
import { DerivationError } from "@pickler/runtime";
import { resolveKey } from "./annotations.js";
import { emitPlan } from "./emit.js";
import { PlanWalker } from "./walker.js";

export const RUNTIME_MODULE = "@pickler/runtime";

/** `(() => { throw new Error(message); })()` */
function errorExpression(ctx: MacroContext, message: string): ts.Expression {
  return ctx.parseExpression(`(() => { throw new Error(${JSON.stringify(message)}); })()`);
}

function report(ctx: MacroContext, node: ts.Node, error: DerivationError): void {
  const descriptor = getDiagnosticDescriptor(error.code) ?? PK9799;
  const builder = ctx.diagnostic(descriptor).at(node).withArgs({ message: error.message, ...error.args });
  if (error.hint) builder.help(error.hint);
  builder.emit();
}

/** A `tagKey` written as a string literal in the options argument. */
function literalTagKey(options: ts.Expression | undefined): string | undefined {
  if (!options || !ts.isObjectLiteralExpression(options)) return undefined;
  for (const prop of options.properties) {
    if (
      ts.isPropertyAssignment(prop) &&
      ts.isIdentifier(prop.name) &&
      prop.name.text === "tagKey" &&
      ts.isStringLiteralLike(prop.initializer)
    ) {
      return prop.initializer.text;
    }
  }
  return undefined;
}

export const deriveReadWriterMacro = defineExpressionMacro({
  name: "deriveReadWriter",
  module: RUNTIME_MODULE,
  description: "Fill in the derivation plan for deriveReadWriter<T>()",

  expand(ctx: MacroContext, callExpr: ts.CallExpression, args: readonly ts.Expression[]): ts.Expression {
    // A plan written by hand
    if (args.length >= 2) return callExpr;

    const typeArg = callExpr.typeArguments?.[0];
    if (!typeArg) {
      ctx
        .diagnostic(PK9707)
        .at(callExpr)
        .withArgs({ type: "T", detail: "no type argument was given" })
        .help("name the type to derive, e.g. `deriveReadWriter<Shape>()`")
        .emit();
      return errorExpression(ctx, "deriveReadWriter<T>() needs a type argument");
    }

    const settings = config.resolved();
    const log = createLogger("derive");
    const walker = new PlanWalker({
      program: ctx.program,
      checker: ctx.typeChecker,
      site: callExpr,
      tagKey: literalTagKey(args[0]) ?? settings.tagKey,
      omitDefaults: settings.omitDefaults,
      log,
      warn: (descriptor, warnArgs) => ctx.diagnostic(descriptor).at(callExpr).withArgs(warnArgs).emit(),
    });

    try {
      const plan = walker.plan(ctx.typeChecker.getTypeFromTypeNode(typeArg), typeArg);
      const planExpr = ctx.parseExpression(emitPlan(plan));
      return ctx.factory.updateCallExpression(callExpr, callExpr.expression, callExpr.typeArguments, [
        args[0] ?? ctx.factory.createIdentifier("undefined"),
        planExpr,
      ]);
    } catch (error) {
      if (!(error instanceof DerivationError)) throw error;
      log.debug(`derivation of \`${typeArg.getText()}\` failed: ${error.message}`);
      report(ctx, callExpr, error);
      return errorExpression(ctx, error.message);
    }
  },
});

function ownerName(target: ts.Node): string {
  for (let node: ts.Node | undefined = target; node; node = node.parent) {
    if ((ts.isClassDeclaration(node) || ts.isInterfaceDeclaration(node)) && node.name) {
      return node.name.text;
    }
  }
  return "<anonymous>";
}

export const keyAttribute = defineAttributeMacro({
  name: "key",
  module: RUNTIME_MODULE,
  description: "Serialize a class, parameter or property under another key",
  validTargets: ["class", "property", "parameter"],

  expand(ctx: MacroContext, decorator: ts.Decorator, target: ts.Declaration): ts.Node {
    // Checked once per declaration, when its first @key is expanded
    const original = ts.getOriginalNode(target);
    const keys = ts.canHaveDecorators(original)
      ? (ts.getDecorators(original) ?? []).filter((d) => decoratorName(d) === "key")
      : [];
    if (keys[0] === ts.getOriginalNode(decorator)) {
      try {
        resolveKey(original, "", ownerName(original));
      } catch (error) {
        if (!(error instanceof DerivationError)) throw error;
        report(ctx, decorator, error);
      }
    }
    return stripDecorator(ctx.factory, target, decorator);
  },
});
