/**
 * Core types for the pickler macro system
 */

import type * as ts from "typescript";
import type { DiagnosticBuilder, DiagnosticDescriptor, RichDiagnostic } from "./diagnostics.js";

// ============================================================================
// Macro Kinds
// ============================================================================

export type MacroKind = "expression" | "attribute";

// ============================================================================
// Macro Context - Available to all macros during expansion
// ============================================================================

export interface MacroContext {
  /** The TypeScript Program instance */
  program: ts.Program;

  /** Type checker for semantic analysis */
  typeChecker: ts.TypeChecker;

  /** Current source file being processed */
  sourceFile: ts.SourceFile;

  /** TypeScript factory for creating nodes */
  factory: ts.NodeFactory;

  /** The transformer context */
  transformContext: ts.TransformationContext;

  /** Parse a code string into an expression */
  parseExpression(code: string): ts.Expression;

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Report a compile-time error */
  reportError(node: ts.Node, message: string): void;

  /**
   * Start a catalog diagnostic. The builder reports through this context
   * when `.emit()` is called.
   */
  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder;
}

// ============================================================================
// Macro Definitions
// ============================================================================

/** Base interface for all macro definitions */
export interface MacroDefinitionBase {
  /** Unique name of the macro */
  name: string;

  /** Optional description for documentation */
  description?: string;

  /**
   * The module specifier that exports this macro's placeholder function.
   * When set, the macro is only activated when the user imports the
   * placeholder from this module.
   *
   * Example: "@pickler/runtime"
   */
  module?: string;

  /**
   * The exported name of the placeholder in the source module.
   * Defaults to `name` if not specified.
   */
  exportName?: string;
}

/** Expression macro - transforms call expressions */
export interface ExpressionMacro extends MacroDefinitionBase {
  kind: "expression";

  /**
   * Expand the macro call into new AST nodes
   * @param callExpr - The macro call expression
   * @param args - The arguments passed to the macro
   */
  expand(
    ctx: MacroContext,
    callExpr: ts.CallExpression,
    args: readonly ts.Expression[],
  ): ts.Expression;
}

/** Attribute macro - transforms decorated declarations */
export interface AttributeMacro extends MacroDefinitionBase {
  kind: "attribute";

  /**
   * Valid targets for this attribute
   */
  validTargets: AttributeTarget[];

  /**
   * Expand the attribute macro. Returning the target unchanged with the
   * decorator removed is how a marker attribute erases itself.
   * @param decorator - The decorator node
   * @param target - The decorated declaration
   * @param args - Arguments passed to the decorator
   */
  expand(
    ctx: MacroContext,
    decorator: ts.Decorator,
    target: ts.Declaration,
    args: readonly ts.Expression[],
  ): ts.Node;
}

export type AttributeTarget = "class" | "method" | "property" | "parameter";

/** Union of all macro types */
export type MacroDefinition = ExpressionMacro | AttributeMacro;

// ============================================================================
// Macro Registry
// ============================================================================

export interface MacroRegistry {
  /** Register a new macro */
  register(macro: MacroDefinition): void;

  /** Look up a macro by its source module and export name */
  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined;

  /** Get all registered macros */
  getAll(): MacroDefinition[];
}

// ============================================================================
// Macro Diagnostics
// ============================================================================

export interface MacroDiagnostic {
  /** Severity level */
  severity: "error" | "warning" | "info";

  /** Diagnostic message */
  message: string;

  /** Source node that caused the diagnostic */
  node?: ts.Node;

  /** Structured form, when the diagnostic comes from the catalog */
  rich?: RichDiagnostic;
}
