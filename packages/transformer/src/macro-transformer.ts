/**
 * Macro transformer
 *
 * A `ts.TransformerFactory` that expands the pickler macros: calls to
 * `deriveReadWriter<T>()` and `@key(...)` decorators imported from
 * `@pickler/runtime`. Anything not imported from a macro module is left
 * alone, so a local function named `deriveReadWriter` is never touched.
 */

import * as ts from "typescript";
import "@pickler/derive";
import {
  createMacroContext,
  createLogger,
  globalRegistry,
  type AttributeMacro,
  type AttributeTarget,
  type ExpressionMacro,
  type Logger,
  type MacroContext,
  type MacroDefinition,
  type MacroKind,
  type MacroRegistry,
  type RichDiagnostic,
} from "@pickler/core";

/**
 * Diagnostic from macro expansion
 */
export interface TransformDiagnostic {
  file: string;
  start: number;
  length: number;
  message: string;
  severity: "error" | "warning" | "info";
  /** Structured form, for catalogued diagnostics */
  rich?: RichDiagnostic;
}

/**
 * Configuration for the transformer
 */
export interface MacroTransformerConfig {
  /** Enable verbose logging */
  verbose?: boolean;

  /** Receives every diagnostic reported while expanding a file */
  onDiagnostic?: (diagnostic: TransformDiagnostic) => void;

  /** Registry to look macros up in (default: the global registry) */
  registry?: MacroRegistry;
}

interface ImportedBinding {
  module: string;
  exportName: string;
  specifier?: ts.ImportSpecifier;
  declaration: ts.ImportDeclaration;
}

type AttributeTargetNode =
  | ts.ClassDeclaration
  | ts.MethodDeclaration
  | ts.PropertyDeclaration
  | ts.ParameterDeclaration;

function isAttributeTarget(node: ts.Node): node is AttributeTargetNode {
  return (
    ts.isClassDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isPropertyDeclaration(node) ||
    ts.isParameter(node)
  );
}

function targetKind(node: AttributeTargetNode): AttributeTarget {
  if (ts.isClassDeclaration(node)) return "class";
  if (ts.isMethodDeclaration(node)) return "method";
  if (ts.isPropertyDeclaration(node)) return "property";
  return "parameter";
}

/**
 * Create the TypeScript transformer factory
 */
export default function macroTransformerFactory(
  program: ts.Program,
  config: MacroTransformerConfig = {},
): ts.TransformerFactory<ts.SourceFile> {
  const log = createLogger("transformer", { verbose: config.verbose });
  const registry = config.registry ?? globalRegistry;

  log.debug(
    `registered macros: ${registry
      .getAll()
      .map((m) => m.name)
      .join(", ")}`,
  );

  return (context: ts.TransformationContext) => {
    return (sourceFile: ts.SourceFile) => {
      log.debug(`processing ${sourceFile.fileName}`);

      const ctx = createMacroContext(program, sourceFile, context);
      const transformer = new MacroTransformer(ctx, registry, log);
      const result = transformer.transformSourceFile(sourceFile);
      log.debug(`${sourceFile.fileName}: ${transformer.expansionCount} macro(s) expanded`);

      for (const diag of ctx.getDiagnostics()) {
        const start = diag.node ? diag.node.getStart(sourceFile) : 0;
        const length = diag.node ? diag.node.getWidth(sourceFile) : 0;

        config.onDiagnostic?.({
          file: sourceFile.fileName,
          start,
          length,
          message: diag.message,
          severity: diag.severity,
          rich: diag.rich,
        });

        const loc = diag.node
          ? ` at ${sourceFile.fileName}:${sourceFile.getLineAndCharacterOfPosition(start).line + 1}`
          : "";
        log.debug(`${diag.severity}${loc}: ${diag.message}`);
      }

      return result;
    };
  };
}

/**
 * The transformer class that handles macro expansion for one file
 */
export class MacroTransformer {
  /**
   * Import specifiers of attribute macros that were expanded. Their
   * decorators are gone after expansion, so the specifiers are removed from
   * the import; an import left with nothing is dropped.
   */
  private macroImportSpecifiers = new Map<ts.ImportDeclaration, Set<ts.ImportSpecifier>>();

  private expansions = 0;

  constructor(
    private readonly ctx: MacroContext,
    private readonly registry: MacroRegistry,
    private readonly log: Logger,
  ) {}

  /** Number of macros expanded so far */
  get expansionCount(): number {
    return this.expansions;
  }

  transformSourceFile(sourceFile: ts.SourceFile): ts.SourceFile {
    const statements = this.visitStatements(sourceFile.statements);
    if (!statements) return sourceFile;
    return this.ctx.factory.updateSourceFile(sourceFile, this.cleanupMacroImports(statements));
  }

  /**
   * Visit a node and potentially transform it
   */
  visit(node: ts.Node): ts.Node {
    if (ts.isBlock(node) || ts.isModuleBlock(node)) {
      return this.visitStatementContainer(node);
    }

    const transformed = this.tryTransform(node);
    if (transformed !== undefined) {
      return transformed;
    }

    return ts.visitEachChild(node, this.visit.bind(this), this.ctx.transformContext);
  }

  /** Visited statements, or undefined when none of them changed. */
  private visitStatements(statements: ts.NodeArray<ts.Statement>): ts.Statement[] | undefined {
    const result: ts.Statement[] = [];
    let modified = false;

    for (const stmt of statements) {
      const visited = this.visit(stmt);
      if (visited !== stmt) modified = true;
      if (ts.isStatement(visited)) result.push(visited);
    }

    return modified ? result : undefined;
  }

  private visitStatementContainer(node: ts.Block | ts.ModuleBlock): ts.Block | ts.ModuleBlock {
    const statements = this.visitStatements(node.statements);
    if (!statements) return node;
    return ts.isBlock(node)
      ? this.ctx.factory.updateBlock(node, statements)
      : this.ctx.factory.updateModuleBlock(node, statements);
  }

  // ---------------------------------------------------------------------------
  // Macro resolution
  // ---------------------------------------------------------------------------

  /**
   * Module and export name an identifier or `ns.name` expression was
   * imported under.
   */
  private importedBinding(expr: ts.Expression): ImportedBinding | undefined {
    const checker = this.ctx.typeChecker;

    if (ts.isIdentifier(expr)) {
      const decl = checker.getSymbolAtLocation(expr)?.declarations?.[0];
      if (!decl || !ts.isImportSpecifier(decl)) return undefined;
      const declaration = decl.parent.parent.parent;
      if (!ts.isImportDeclaration(declaration) || !ts.isStringLiteral(declaration.moduleSpecifier)) {
        return undefined;
      }
      return {
        module: declaration.moduleSpecifier.text,
        exportName: (decl.propertyName ?? decl.name).text,
        specifier: decl,
        declaration,
      };
    }

    if (ts.isPropertyAccessExpression(expr) && ts.isIdentifier(expr.expression)) {
      const decl = checker.getSymbolAtLocation(expr.expression)?.declarations?.[0];
      if (!decl || !ts.isNamespaceImport(decl)) return undefined;
      const declaration = decl.parent.parent;
      if (!ts.isImportDeclaration(declaration) || !ts.isStringLiteral(declaration.moduleSpecifier)) {
        return undefined;
      }
      return { module: declaration.moduleSpecifier.text, exportName: expr.name.text, declaration };
    }

    return undefined;
  }

  private resolveMacro(expr: ts.Expression, kind: MacroKind): MacroDefinition | undefined {
    const binding = this.importedBinding(expr);
    if (!binding) return undefined;

    const macro = this.registry.getByModuleExport(binding.module, binding.exportName);
    if (!macro || macro.kind !== kind) return undefined;
    return macro;
  }

  /** Mark the import an expanded attribute macro came from for cleanup */
  private trackAttributeImport(expr: ts.Expression): void {
    const binding = this.importedBinding(expr);
    if (!binding?.specifier) return;

    let set = this.macroImportSpecifiers.get(binding.declaration);
    if (!set) {
      set = new Set();
      this.macroImportSpecifiers.set(binding.declaration, set);
    }
    set.add(binding.specifier);
  }

  private resolveExpressionMacro(expr: ts.Expression): ExpressionMacro | undefined {
    const macro = this.resolveMacro(expr, "expression");
    return macro?.kind === "expression" ? macro : undefined;
  }

  private resolveAttributeMacro(expr: ts.Expression): AttributeMacro | undefined {
    const macro = this.resolveMacro(expr, "attribute");
    return macro?.kind === "attribute" ? macro : undefined;
  }

  // ---------------------------------------------------------------------------
  // Import cleanup
  // ---------------------------------------------------------------------------

  /**
   * Remove the specifiers of expanded attribute macros from their imports.
   * Default and namespace bindings are kept.
   */
  private cleanupMacroImports(statements: ts.Statement[]): ts.Statement[] {
    if (this.macroImportSpecifiers.size === 0) return statements;

    const factory = this.ctx.factory;
    const result: ts.Statement[] = [];

    for (const stmt of statements) {
      const tracked = ts.isImportDeclaration(stmt) ? this.macroImportSpecifiers.get(stmt) : undefined;
      const importClause = ts.isImportDeclaration(stmt) ? stmt.importClause : undefined;
      const namedBindings = importClause?.namedBindings;
      if (
        !tracked ||
        !ts.isImportDeclaration(stmt) ||
        !importClause ||
        !namedBindings ||
        !ts.isNamedImports(namedBindings)
      ) {
        result.push(stmt);
        continue;
      }

      const remaining = namedBindings.elements.filter((spec) => !tracked.has(spec));
      const moduleSpec = ts.isStringLiteral(stmt.moduleSpecifier) ? stmt.moduleSpecifier.text : "<unknown>";

      if (remaining.length === 0 && !importClause.name) {
        this.log.debug(`removing macro-only import from "${moduleSpec}"`);
        continue;
      }

      const newImportClause = factory.updateImportClause(
        importClause,
        importClause.isTypeOnly,
        importClause.name,
        remaining.length > 0 ? factory.updateNamedImports(namedBindings, remaining) : undefined,
      );
      result.push(
        factory.updateImportDeclaration(
          stmt,
          stmt.modifiers,
          newImportClause,
          stmt.moduleSpecifier,
          stmt.attributes,
        ),
      );
      this.log.debug(`trimmed macro specifiers from import "${moduleSpec}"`);
    }

    return result;
  }

  // ---------------------------------------------------------------------------
  // Macro expansion
  // ---------------------------------------------------------------------------

  /**
   * Try to transform a node if it's a macro invocation
   */
  private tryTransform(node: ts.Node): ts.Node | undefined {
    if (ts.isCallExpression(node)) {
      const result = this.tryExpandExpressionMacro(node);
      if (result !== undefined) {
        return result;
      }
    }

    if (ts.canHaveDecorators(node)) {
      const result = this.tryExpandAttributeMacros(node);
      if (result !== undefined) {
        return result;
      }
    }

    return undefined;
  }

  private tryExpandExpressionMacro(node: ts.CallExpression): ts.Expression | undefined {
    const macro = this.resolveExpressionMacro(node.expression);
    if (!macro) return undefined;

    this.log.debug(`expanding expression macro: ${macro.name}`);

    let result: ts.Expression;
    try {
      result = macro.expand(this.ctx, node, node.arguments);
    } catch (error) {
      this.ctx.reportError(node, `Macro expansion failed: ${String(error)}`);
      return this.createMacroErrorExpression(`pickler: expansion of '${macro.name}' failed: ${String(error)}`);
    }

    // A call that needs no expansion comes back unchanged
    if (result === node) return undefined;

    this.expansions++;
    return ts.visitEachChild(result, this.visit.bind(this), this.ctx.transformContext);
  }

  private tryExpandAttributeMacros(node: ts.HasDecorators): ts.Node | undefined {
    const decorators = ts.getDecorators(node);
    if (!decorators || decorators.length === 0) return undefined;

    let currentNode: ts.Node = node;
    let wasTransformed = false;

    for (const decorator of decorators) {
      const callee = ts.isCallExpression(decorator.expression)
        ? decorator.expression.expression
        : decorator.expression;
      const macro = this.resolveAttributeMacro(callee);
      if (!macro) continue;

      const target = currentNode;
      if (!isAttributeTarget(target)) {
        this.ctx.reportError(decorator, `@${macro.name} cannot be applied to this declaration`);
        continue;
      }
      const kind = targetKind(target);
      if (!macro.validTargets.includes(kind)) {
        this.ctx.reportError(decorator, `@${macro.name} cannot be applied to a ${kind}`);
        continue;
      }

      this.log.debug(`expanding attribute macro: ${macro.name}`);
      const args = ts.isCallExpression(decorator.expression) ? decorator.expression.arguments : [];

      try {
        currentNode = macro.expand(this.ctx, decorator, target, args);
        this.trackAttributeImport(callee);
        this.expansions++;
        wasTransformed = true;
      } catch (error) {
        this.ctx.reportError(decorator, `Attribute macro expansion failed: ${String(error)}`);
      }
    }

    if (!wasTransformed) return undefined;
    return ts.visitEachChild(currentNode, this.visit.bind(this), this.ctx.transformContext);
  }

  private createMacroErrorExpression(message: string): ts.Expression {
    const factory = this.ctx.factory;
    return factory.createCallExpression(
      factory.createParenthesizedExpression(
        factory.createArrowFunction(
          undefined,
          undefined,
          [],
          undefined,
          factory.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
          factory.createBlock([
            factory.createThrowStatement(
              factory.createNewExpression(factory.createIdentifier("Error"), undefined, [
                factory.createStringLiteral(message),
              ]),
            ),
          ]),
        ),
      ),
      undefined,
      [],
    );
  }
}
