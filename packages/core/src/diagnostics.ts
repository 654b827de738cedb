/**
 * Diagnostics System for pickler
 *
 * Structured, catalogued build-time errors:
 * - Error codes in the TS custom range, rendered as `PK97xx`
 * - Rich diagnostics with labeled spans, notes and help
 * - Builder API for macro authors
 *
 * @example
 * ```typescript
 * ctx.diagnostic(PK9702)
 *   .at(callExpr)
 *   .withArgs({ type: "Shape" })
 *   .note("`Shape` resolved to `never`")
 *   .help("a union must list at least one class or singleton")
 *   .emit();
 * ```
 */

import type * as ts from "typescript";
import type { MacroDiagnostic } from "./types.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Derivation = "derive",
  Annotation = "annotation",
  MacroExpansion = "expansion",
  Internal = "internal",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 9700-9799 */
  readonly code: number;

  /** Default severity */
  readonly severity: "error" | "warning" | "info";

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation, shown by the CLI renderer on request */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/**
 * A labeled span pointing at specific code with a message.
 * Used for secondary annotations like "declared here".
 */
export interface LabeledSpan {
  node: ts.Node;
  message: string;
  primary?: boolean;
}

/**
 * Rich diagnostic with multiple spans, notes and help.
 * This is the structured form that renders to CLI output or collapses to a
 * plain message for the compiler's diagnostic list.
 */
export interface RichDiagnostic {
  /** The error code from the catalog */
  code: number;

  severity: "error" | "warning" | "info";

  category: DiagnosticCategory;

  /** Primary message (with placeholders interpolated) */
  message: string;

  /** The primary span (main error location) */
  primarySpan?: {
    node: ts.Node;
    sourceFile: ts.SourceFile;
  };

  /** Secondary labeled spans (additional context) */
  labels: LabeledSpan[];

  /** Additional notes (not attached to spans) */
  notes: string[];

  /** Help text (actionable suggestion in prose) */
  help?: string;

  /** Long-form explanation from the catalog */
  explanation?: string;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 *
 * @example
 * ```typescript
 * new DiagnosticBuilder(PK9704, sourceFile, emitter)
 *   .at(typeArgument)
 *   .withArgs({ type: "Point", field: "x" })
 *   .label(param, "`x` is declared here")
 *   .emit();
 * ```
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly sourceFile: ts.SourceFile,
    private readonly emitter: (diagnostic: RichDiagnostic) => void,
  ) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      labels: [],
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(node: ts.Node): this {
    this.diagnostic.primarySpan = { node, sourceFile: this.sourceFile };
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Readonly<Record<string, string | number | undefined>>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  /**
   * Add a secondary labeled span.
   */
  label(node: ts.Node, message: string): this {
    this.diagnostic.labels.push({ node, message, primary: false });
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  /**
   * Interpolate message template with provided arguments. Unknown
   * placeholders are left as written.
   */
  private interpolateMessage(): string {
    return this.descriptor.messageTemplate.replace(/\{(\w+)\}/g, (placeholder, key: string) =>
      Object.hasOwn(this.args, key) ? this.args[key] : placeholder,
    );
  }

  /**
   * Emit the diagnostic via the registered emitter.
   */
  emit(): void {
    this.diagnostic.message = this.interpolateMessage();
    this.emitter(this.diagnostic);
  }
}

// ============================================================================
// Error Catalog: Derivation (9701-9719)
// ============================================================================

export const PK9701: DiagnosticDescriptor = {
  code: 9701,
  severity: "error",
  category: DiagnosticCategory.Derivation,
  messageTemplate: "`{type}` is an open hierarchy; only closed unions can be derived as sum types",
  explanation: `An abstract class or an interface can be extended from anywhere, so the
set of its subclasses is not known when the converter is generated.

Correct:
  type Shape = Circle | Square;
  const shapeRW = deriveReadWriter<Shape>();

Incorrect:
  abstract class Shape {}
  const shapeRW = deriveReadWriter<Shape>();  // open hierarchy`,
};

export const PK9702: DiagnosticDescriptor = {
  code: 9702,
  severity: "error",
  category: DiagnosticCategory.Derivation,
  messageTemplate: "Sum type `{type}` has no alternatives",
  explanation: `A union with no members (or one that resolved to \`never\`) has no value
that could be written, and no tag that could be read.`,
};

export const PK9703: DiagnosticDescriptor = {
  code: 9703,
  severity: "error",
  category: DiagnosticCategory.Derivation,
  messageTemplate: "Cannot construct `{type}`: no public constructor and no static `of` factory",
  explanation: `Reading a product type calls its constructor with the decoded fields in
declaration order. A class with a private or protected constructor needs a
public static \`of(...)\` with the same parameters instead.`,
};

export const PK9704: DiagnosticDescriptor = {
  code: 9704,
  severity: "error",
  category: DiagnosticCategory.Derivation,
  messageTemplate: "Cannot read field `{field}` back out of `{type}`",
  explanation: `Writing a product type reads every constructor parameter back out of the
value. A parameter is readable when it is a parameter property
(\`readonly x: number\`), when the class declares a property of the same
name, or when the class provides \`static unapply(value)\` returning the
fields in parameter order.`,
};

export const PK9706: DiagnosticDescriptor = {
  code: 9706,
  severity: "error",
  category: DiagnosticCategory.Derivation,
  messageTemplate: "Duplicate {what} `{key}` in `{type}`",
  explanation: `Two fields of one type, or two alternatives of one union, were given the
same serialized name. Keys must be unique within an object and tags
unique within a union. A field may also not use the union's tag key.`,
};

export const PK9707: DiagnosticDescriptor = {
  code: 9707,
  severity: "error",
  category: DiagnosticCategory.Derivation,
  messageTemplate: "Cannot derive a converter for `{type}`: {detail}",
  explanation: `Converters can be derived for classes, object types, closed unions of
those, and the built-in leaf types. Functions, symbols, generic type
parameters and intersections have no tree form. Register a converter for
the type by name to use it as a field type.`,
};

// ============================================================================
// Error Catalog: Annotations (9705)
// ============================================================================

export const PK9705: DiagnosticDescriptor = {
  code: 9705,
  severity: "error",
  category: DiagnosticCategory.Annotation,
  messageTemplate: "Malformed @key annotation on `{type}`: {detail}",
  explanation: `@key takes exactly one string literal argument, and a declaration may
carry at most one key annotation.

Correct:
  constructor(@key("user_name") readonly name: string) {}

Incorrect:
  constructor(@key(NAME) readonly name: string) {}  // not a literal`,
};

// ============================================================================
// Warnings (9720-9739)
// ============================================================================

export const PK9720: DiagnosticDescriptor = {
  code: 9720,
  severity: "warning",
  category: DiagnosticCategory.Derivation,
  messageTemplate:
    "Default value of `{field}` in `{type}` refers to another parameter; the field is read as optional",
  explanation: `A default initializer that mentions an earlier parameter cannot be
evaluated without the rest of the value. The converter treats such a
field as optional: it is always written, and when absent the constructor
receives \`undefined\` and applies its own default.`,
};

export const PK9721: DiagnosticDescriptor = {
  code: 9721,
  severity: "warning",
  category: DiagnosticCategory.Derivation,
  messageTemplate:
    "Default value of `{field}` in `{type}` uses `{name}`, which is not in scope here; the field is read as optional",
  explanation: `The generated converter evaluates default initializers at the call site of
deriveReadWriter. When an initializer mentions a name that the calling
module cannot see, the field is treated as optional instead: the
constructor applies its own default when the field is absent. Import the
name into the calling module to have the default written out and
compared.`,
};

// ============================================================================
// Error Catalog: Internal Errors (9799)
// ============================================================================

export const PK9799: DiagnosticDescriptor = {
  code: 9799,
  severity: "error",
  category: DiagnosticCategory.Internal,
  messageTemplate: "Internal error: {message}",
  explanation: `The converter generator failed in a way it does not expect. Include the
message and a minimal reproduction when reporting it.`,
};

// ============================================================================
// Error Code Registry
// ============================================================================

/** All registered diagnostic descriptors by code */
export const DIAGNOSTIC_CATALOG: Map<number, DiagnosticDescriptor> = new Map([
  [9701, PK9701],
  [9702, PK9702],
  [9703, PK9703],
  [9704, PK9704],
  [9705, PK9705],
  [9706, PK9706],
  [9707, PK9707],
  [9720, PK9720],
  [9721, PK9721],
  [9799, PK9799],
]);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

// ============================================================================
// Utility: Convert RichDiagnostic to MacroDiagnostic
// ============================================================================

/**
 * Collapse a RichDiagnostic to the single-message form the transformer
 * reports to the compiler.
 */
export function richToLegacyDiagnostic(rich: RichDiagnostic): MacroDiagnostic {
  let message = `[PK${rich.code}] ${rich.message}`;

  if (rich.notes.length > 0) {
    message += "\n" + rich.notes.map((n) => `  = note: ${n}`).join("\n");
  }

  if (rich.help) {
    message += `\n  = help: ${rich.help}`;
  }

  return {
    severity: rich.severity,
    message,
    node: rich.primarySpan?.node,
    rich,
  };
}

// ============================================================================
// CLI Renderer: Rust-Style Error Output
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or PICKLER_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type Style = keyof typeof COLORS;

function colorsFromEnv(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.PICKLER_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: "error" | "warning" | "info"): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

function getLineAndColumn(sourceFile: ts.SourceFile, pos: number): { line: number; column: number } {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(pos);
  return { line: line + 1, column: character + 1 };
}

function getLineText(sourceFile: ts.SourceFile, lineNumber: number): string {
  const lines = sourceFile.text.split("\n");
  return lines[lineNumber - 1] ?? "";
}

function createUnderline(startColumn: number, length: number, char: string = "^"): string {
  return " ".repeat(startColumn - 1) + char.repeat(Math.max(1, length));
}

export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect from the environment) */
  colors?: boolean;
  /** Number of context lines before/after the error (default: 2) */
  contextLines?: number;
  /** Whether to show the explanation (default: false) */
  showExplanation?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

/**
 * Render a RichDiagnostic to CLI output in Rust-style format.
 *
 * @example Output:
 * ```
 * error[PK9702]: Sum type `Shape` has no alternatives
 *   --> src/shapes.ts:4:23
 *    |
 *  4 | const shapeRW = deriveReadWriter<Shape>();
 *    |                       ^^^^^^^^^^^^^^^^^^^^^^^^
 *    |
 *    = help: a union must list at least one class or singleton
 * ```
 */
export function renderDiagnosticCLI(diagnostic: RichDiagnostic, options: CLIRenderOptions = {}): string {
  const { contextLines = 2, showExplanation = false } = options;
  const useColors = options.colors ?? colorsFromEnv();
  const color = (text: string, ...styles: Style[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);

  lines.push(
    `${color(diagnostic.severity, "bold", severityClr)}${color(`[PK${diagnostic.code}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`,
  );

  if (diagnostic.primarySpan) {
    const { node, sourceFile } = diagnostic.primarySpan;
    const startPos = getLineAndColumn(sourceFile, node.getStart(sourceFile));
    const endPos = getLineAndColumn(sourceFile, node.getEnd());
    lines.push(`  ${color("-->", "blue")} ${sourceFile.fileName}:${startPos.line}:${startPos.column}`);

    const minLine = Math.max(1, startPos.line - contextLines);
    const maxLine = Math.min(endPos.line + contextLines, sourceFile.getLineStarts().length);
    const numWidth = Math.max(3, String(maxLine).length);
    const gutter = " ".repeat(numWidth);
    const bar = color("|", "blue");

    lines.push(` ${gutter} ${bar}`);

    for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
      const lineText = getLineText(sourceFile, lineNum);
      lines.push(` ${color(String(lineNum).padStart(numWidth, " "), "blue")} ${bar} ${lineText}`);

      if (lineNum >= startPos.line && lineNum <= endPos.line) {
        const lineStartCol = lineNum === startPos.line ? startPos.column : 1;
        const lineEndCol = lineNum === endPos.line ? endPos.column : lineText.length + 1;
        const underline = createUnderline(lineStartCol, lineEndCol - lineStartCol, "^");
        lines.push(` ${gutter} ${bar} ${color(underline, severityClr)}`);
      }
    }

    for (const label of diagnostic.labels) {
      if (label.primary) continue;
      const labelStart = getLineAndColumn(sourceFile, label.node.getStart(sourceFile));
      const labelEnd = getLineAndColumn(sourceFile, label.node.getEnd());
      lines.push(` ${gutter} ${bar}`);
      lines.push(
        ` ${color(String(labelStart.line).padStart(numWidth, " "), "blue")} ${bar} ${getLineText(sourceFile, labelStart.line)}`,
      );
      const underline = createUnderline(labelStart.column, labelEnd.column - labelStart.column, "-");
      lines.push(` ${gutter} ${bar} ${color(underline, "blue")} ${color(label.message, "blue")}`);
    }

    lines.push(` ${gutter} ${bar}`);
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(diagnostics: RichDiagnostic[], options: CLIRenderOptions = {}): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const lines: string[] = [];
  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;
  const parts: string[] = [];
  if (errorCount > 0) parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  if (warnCount > 0) parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  if (parts.length > 0) {
    lines.push(`${parts.join(", ")} generated`);
  }

  return lines.join("\n");
}

/**
 * Print multiple diagnostics with a summary to stderr (or `options.writer`).
 */
export function printDiagnostics(diagnostics: RichDiagnostic[], options: CLIRenderOptions = {}): void {
  const writer = options.writer ?? ((line: string) => console.error(line));
  writer(renderDiagnosticsCLI(diagnostics, options));
}
