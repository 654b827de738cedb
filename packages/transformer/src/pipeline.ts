/**
 * TransformationPipeline - expands macros file by file against one program
 *
 * Used by the bundler plugins. Expansion needs the type checker, so every
 * file is transformed against a `ts.Program` holding the whole project.
 */

import * as ts from "typescript";
import * as path from "path";
import { createLogger, type Logger } from "@pickler/core";
import { TransformCache, hashContent } from "./cache.js";
import macroTransformerFactory, {
  type MacroTransformerConfig,
  type TransformDiagnostic,
} from "./macro-transformer.js";

/**
 * Result of transforming a single file
 */
export interface TransformResult {
  /** Original source content */
  original: string;
  /** Transformed code (valid TypeScript) */
  code: string;
  /** Whether the file was modified */
  changed: boolean;
  /** Macro expansion diagnostics */
  diagnostics: TransformDiagnostic[];
  /** Project files this file imports, directly or through other project files */
  dependencies: Set<string>;
}

/**
 * Options for the transformation pipeline
 */
export interface PipelineOptions {
  /** Enable verbose logging */
  verbose?: boolean;
  /** Macro transformer config; `onDiagnostic` is chained, not replaced */
  transformerConfig?: MacroTransformerConfig;
  /** Custom file reader (defaults to ts.sys.readFile) */
  readFile?: (fileName: string) => string | undefined;
  /** Custom file existence checker (defaults to ts.sys.fileExists) */
  fileExists?: (fileName: string) => boolean;
  /** Maximum cache size (default: 1000) */
  maxCacheSize?: number;
}

/**
 * TransformationPipeline
 *
 * ```typescript
 * const pipeline = createPipeline("./tsconfig.json");
 * const result = pipeline.transform("src/shapes.ts");
 * console.log(result.code);
 * ```
 */
export class TransformationPipeline {
  private host: ts.CompilerHost;
  private program: ts.Program | undefined;
  /** Program replaced by the last invalidation, reused for incremental parsing */
  private oldProgram: ts.Program | undefined;
  private cache: TransformCache;
  private log: Logger;
  private readFile: (fileName: string) => string | undefined;
  private fileNames: string[];
  /** Content hash cache for dependency validation */
  private contentHashes = new Map<string, string>();

  constructor(
    private compilerOptions: ts.CompilerOptions,
    fileNames: string[],
    private options: PipelineOptions = {},
  ) {
    this.log = createLogger("pipeline", { verbose: options.verbose });
    this.readFile = options.readFile ?? ts.sys.readFile;
    this.fileNames = fileNames.map((f) => path.resolve(f));
    this.cache = new TransformCache({ maxSize: options.maxCacheSize ?? 1000 });
    this.host = this.createHost();
  }

  /**
   * Transform a single file
   */
  transform(fileName: string): TransformResult {
    const normalizedFileName = path.resolve(fileName);

    const original = this.readFile(normalizedFileName);
    if (original === undefined) {
      return this.createEmptyResult(normalizedFileName);
    }

    const contentHash = hashContent(original);
    this.contentHashes.set(normalizedFileName, contentHash);

    const cached = this.cache.get(normalizedFileName, contentHash, (dep) => this.getContentHash(dep));
    if (cached) {
      this.log.debug(`cache hit for ${normalizedFileName}`);
      return cached;
    }

    if (!this.fileNames.includes(normalizedFileName)) {
      // Outside the project's file list: add it so the checker can see it
      this.fileNames.push(normalizedFileName);
      this.resetProgram();
    }

    const program = this.getProgram();
    const sourceFile = program.getSourceFile(normalizedFileName);
    if (!sourceFile) {
      return this.createEmptyResult(normalizedFileName);
    }

    const dependencies = this.collectDependencies(program, sourceFile);
    const { code, diagnostics } = this.runMacroTransformer(program, sourceFile, original);
    const changed = code !== original;

    const result: TransformResult = { original, code, changed, diagnostics, dependencies };

    const dependencyHashes = new Map<string, string>();
    for (const dep of dependencies) {
      const hash = this.getContentHash(dep);
      if (hash) dependencyHashes.set(dep, hash);
    }
    this.cache.set(normalizedFileName, { result, contentHash, dependencyHashes });

    this.log.debug(
      `transformed ${normalizedFileName} (changed: ${changed}, dependencies: ${dependencies.size}, diagnostics: ${diagnostics.length})`,
    );

    return result;
  }

  /**
   * Transform all files in the project
   */
  transformAll(): Map<string, TransformResult> {
    const results = new Map<string, TransformResult>();
    for (const fileName of [...this.fileNames]) {
      results.set(fileName, this.transform(fileName));
    }
    return results;
  }

  /**
   * Invalidate a changed file and every file that imports it
   */
  invalidate(fileName: string): void {
    const normalizedFileName = path.resolve(fileName);
    this.contentHashes.delete(normalizedFileName);

    const dependents = this.cache.invalidate(normalizedFileName);
    if (dependents.size > 0) {
      this.log.debug(`invalidated ${normalizedFileName} and ${dependents.size} dependents`);
    }
    this.resetProgram();
  }

  /**
   * Full invalidation (e.g., tsconfig change)
   */
  invalidateAll(): void {
    this.cache.clear();
    this.contentHashes.clear();
    this.program = undefined;
    this.oldProgram = undefined;
  }

  /**
   * Get the current ts.Program (creates if needed)
   */
  getProgram(): ts.Program {
    if (!this.program) {
      this.log.debug(`creating program with ${this.fileNames.length} files`);
      this.program = ts.createProgram({
        rootNames: this.fileNames,
        options: this.compilerOptions,
        host: this.host,
        oldProgram: this.oldProgram,
      });
      this.oldProgram = undefined;
    }
    return this.program;
  }

  /**
   * Get all file names in the project
   */
  getFileNames(): string[] {
    return this.fileNames;
  }

  /**
   * Check if a file should be transformed
   */
  shouldTransform(fileName: string): boolean {
    if (fileName.includes("node_modules")) return false;
    if (/\.d\.[cm]?ts$/.test(fileName)) return false;
    return /\.[cm]?tsx?$/.test(fileName);
  }

  // ---------------------------------------------------------------------------
  // Private methods
  // ---------------------------------------------------------------------------

  private createHost(): ts.CompilerHost {
    const host = ts.createCompilerHost(this.compilerOptions, true);
    const readFile = this.readFile;
    const fileExists = this.options.fileExists ?? ts.sys.fileExists;

    host.readFile = readFile;
    host.fileExists = fileExists;
    host.getSourceFile = (fileName, languageVersion) => {
      const text = readFile(fileName);
      return text === undefined ? undefined : ts.createSourceFile(fileName, text, languageVersion, true);
    };
    return host;
  }

  private resetProgram(): void {
    if (this.program) {
      this.oldProgram = this.program;
      this.program = undefined;
    }
  }

  private runMacroTransformer(
    program: ts.Program,
    sourceFile: ts.SourceFile,
    originalCode: string,
  ): { code: string; diagnostics: TransformDiagnostic[] } {
    const diagnostics: TransformDiagnostic[] = [];
    const userConfig = this.options.transformerConfig ?? {};
    const factory = macroTransformerFactory(program, {
      ...userConfig,
      verbose: userConfig.verbose ?? this.options.verbose,
      onDiagnostic: (diagnostic) => {
        diagnostics.push(diagnostic);
        userConfig.onDiagnostic?.(diagnostic);
      },
    });

    try {
      const result = ts.transform(sourceFile, [factory]);
      const transformed = result.transformed[0];
      const code =
        transformed === undefined || transformed === sourceFile
          ? originalCode
          : ts.createPrinter({ newLine: ts.NewLineKind.LineFeed }).printFile(transformed);
      result.dispose();
      return { code, diagnostics };
    } catch (error) {
      this.log.warn(`transform failed for ${sourceFile.fileName}: ${String(error)}`);
      diagnostics.push({
        file: sourceFile.fileName,
        start: 0,
        length: 0,
        message: `Transform failed: ${String(error)}`,
        severity: "error",
      });
      return { code: originalCode, diagnostics };
    }
  }

  private getContentHash(fileName: string): string | undefined {
    const cached = this.contentHashes.get(fileName);
    if (cached) return cached;

    const content = this.readFile(fileName);
    if (content === undefined) return undefined;

    const hash = hashContent(content);
    this.contentHashes.set(fileName, hash);
    return hash;
  }

  /**
   * Project files reachable from a source file through imports. A derived
   * plan can depend on types declared any number of imports away.
   */
  private collectDependencies(program: ts.Program, sourceFile: ts.SourceFile): Set<string> {
    const self = path.resolve(sourceFile.fileName);
    const dependencies = new Set<string>();
    const queue = [sourceFile];
    for (let file = queue.shift(); file; file = queue.shift()) {
      for (const dep of this.extractDependencies(file)) {
        if (dep === self || dependencies.has(dep)) continue;
        dependencies.add(dep);
        const next = program.getSourceFile(dep);
        if (next) queue.push(next);
      }
    }
    return dependencies;
  }

  /**
   * Project files imported by a source file, static and dynamic
   */
  private extractDependencies(sourceFile: ts.SourceFile): Set<string> {
    const dependencies = new Set<string>();

    const add = (specifier: ts.Expression | undefined): void => {
      if (!specifier || !ts.isStringLiteral(specifier)) return;
      const resolved = ts.resolveModuleName(
        specifier.text,
        sourceFile.fileName,
        this.compilerOptions,
        this.host,
      ).resolvedModule;
      if (resolved && !resolved.isExternalLibraryImport) {
        dependencies.add(path.resolve(resolved.resolvedFileName));
      }
    };

    const visit = (node: ts.Node): void => {
      if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) {
        add(node.moduleSpecifier);
      } else if (ts.isCallExpression(node) && node.expression.kind === ts.SyntaxKind.ImportKeyword) {
        add(node.arguments[0]);
      }
      ts.forEachChild(node, visit);
    };
    visit(sourceFile);

    return dependencies;
  }

  private createEmptyResult(fileName: string): TransformResult {
    return {
      original: "",
      code: "",
      changed: false,
      diagnostics: [
        {
          file: fileName,
          start: 0,
          length: 0,
          message: `File not found: ${fileName}`,
          severity: "error",
        },
      ],
      dependencies: new Set(),
    };
  }
}

/**
 * Create a pipeline from a tsconfig.json path
 */
export function createPipeline(tsconfigPath: string, options?: PipelineOptions): TransformationPipeline {
  const configFile = ts.readConfigFile(tsconfigPath, ts.sys.readFile);
  if (configFile.error) {
    throw new Error(
      `Error reading ${tsconfigPath}: ${ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n")}`,
    );
  }

  const parsed = ts.parseJsonConfigFileContent(configFile.config, ts.sys, path.dirname(tsconfigPath));

  return new TransformationPipeline(parsed.options, parsed.fileNames, options);
}

/**
 * Compiler options for single-file transformation
 */
export const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  strict: true,
  experimentalDecorators: true,
  skipLibCheck: true,
  noEmit: true,
};

/**
 * Transform one file given as text
 *
 * Imports resolve from the real filesystem, so `@pickler/runtime` is found
 * where it is installed.
 */
export function transformCode(
  code: string,
  options: { fileName?: string; compilerOptions?: ts.CompilerOptions } & PipelineOptions = {},
): TransformResult {
  const fileName = path.resolve(options.fileName ?? "input.ts");
  const pipeline = new TransformationPipeline(
    options.compilerOptions ?? DEFAULT_COMPILER_OPTIONS,
    [fileName],
    {
      ...options,
      readFile: (f) => (path.resolve(f) === fileName ? code : ts.sys.readFile(f)),
      fileExists: (f) => path.resolve(f) === fileName || ts.sys.fileExists(f),
    },
  );
  return pipeline.transform(fileName);
}
