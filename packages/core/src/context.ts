/**
 * MacroContext Implementation - Provides utilities for macro expansion
 */

import * as ts from "typescript";
import type { MacroContext, MacroDiagnostic } from "./types.js";
import { DiagnosticBuilder, richToLegacyDiagnostic, type DiagnosticDescriptor } from "./diagnostics.js";
import { stripPositions } from "./ast-utils.js";

function syntaxErrors(code: string): readonly ts.Diagnostic[] {
  const { diagnostics } = ts.transpileModule(code, {
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022 },
  });
  return diagnostics ?? [];
}

export class MacroContextImpl implements MacroContext {
  private readonly diagnostics: MacroDiagnostic[] = [];

  constructor(
    public readonly program: ts.Program,
    public readonly typeChecker: ts.TypeChecker,
    public readonly sourceFile: ts.SourceFile,
    public readonly factory: ts.NodeFactory,
    public readonly transformContext: ts.TransformationContext,
  ) {}

  parseExpression(code: string): ts.Expression {
    const text = `const __expr__ = ${code};`;
    if (syntaxErrors(text).length > 0) {
      throw new Error(`Failed to parse expression: ${code}`);
    }

    const tempSource = ts.createSourceFile(
      "__macro_temp__.ts",
      text,
      ts.ScriptTarget.Latest,
      true,
      ts.ScriptKind.TS,
    );

    const statement = tempSource.statements[0];
    if (ts.isVariableStatement(statement)) {
      const declaration = statement.declarationList.declarations[0];
      if (declaration.initializer) {
        return stripPositions(declaration.initializer);
      }
    }

    throw new Error(`Failed to parse expression: ${code}`);
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  reportError(node: ts.Node, message: string): void {
    this.diagnostics.push({ severity: "error", message, node });
  }

  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder {
    return new DiagnosticBuilder(descriptor, this.sourceFile, (rich) => {
      this.diagnostics.push(richToLegacyDiagnostic(rich));
    });
  }

  getDiagnostics(): MacroDiagnostic[] {
    return [...this.diagnostics];
  }
}

/**
 * Create a macro context for a given program and source file
 */
export function createMacroContext(
  program: ts.Program,
  sourceFile: ts.SourceFile,
  transformContext: ts.TransformationContext,
): MacroContextImpl {
  return new MacroContextImpl(
    program,
    program.getTypeChecker(),
    sourceFile,
    transformContext.factory,
    transformContext,
  );
}
