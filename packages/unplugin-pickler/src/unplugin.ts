/**
 * pickler unplugin integration
 *
 * Universal plugin that works with Vite, Rollup, Webpack, esbuild, and Rspack.
 * Uses the TransformationPipeline from @pickler/transformer for all
 * transformation logic.
 */

import * as ts from "typescript";
import * as path from "path";
import { createUnplugin, type UnpluginFactory } from "unplugin";
import { createLogger, printDiagnostics } from "@pickler/core";
import {
  createPipeline,
  initHasher,
  type TransformDiagnostic,
  type TransformationPipeline,
} from "@pickler/transformer";

export interface PicklerPluginOptions {
  /** Path to tsconfig.json (default: auto-detected) */
  tsconfig?: string;

  /** File patterns to include (default: /\.[cm]?tsx?$/) */
  include?: RegExp | string[];

  /** File patterns to exclude (default: /node_modules/) */
  exclude?: RegExp | string[];

  /** Enable verbose logging */
  verbose?: boolean;
}

export function findTsConfig(cwd: string, explicit?: string): string {
  if (explicit) {
    return path.resolve(cwd, explicit);
  }

  const found = ts.findConfigFile(cwd, ts.sys.fileExists, "tsconfig.json");
  if (!found) {
    throw new Error(
      `[pickler] Could not find tsconfig.json from ${cwd}. ` +
        `Pass the tsconfig option to specify the path explicitly.`,
    );
  }
  return found;
}

export function shouldTransform(id: string, include?: RegExp | string[], exclude?: RegExp | string[]): boolean {
  const normalizedId = id.replace(/\\/g, "/");

  if (exclude) {
    if (exclude instanceof RegExp) {
      if (exclude.test(normalizedId)) return false;
    } else if (exclude.some((pattern) => normalizedId.includes(pattern))) {
      return false;
    }
  } else if (/node_modules/.test(normalizedId)) {
    return false;
  }

  if (include) {
    if (include instanceof RegExp) {
      return include.test(normalizedId);
    }
    return include.some((pattern) => normalizedId.includes(pattern));
  }

  // Declarations and plain JS carry no type arguments to derive from
  return /\.[cm]?tsx?$/.test(normalizedId) && !/\.d\.[cm]?ts$/.test(normalizedId);
}

/**
 * Print expansion diagnostics: catalogued ones in the CLI format, the rest
 * one per line.
 */
export function reportDiagnostics(
  diagnostics: readonly TransformDiagnostic[],
  writer: (line: string) => void = (line) => console.error(line),
): void {
  const rich = diagnostics.flatMap((d) => (d.rich ? [d.rich] : []));
  if (rich.length > 0) {
    printDiagnostics(rich, { writer });
  }
  for (const diag of diagnostics) {
    if (!diag.rich) writer(`${diag.severity}: ${diag.message}\n  --> ${diag.file}`);
  }
}

export const unpluginFactory: UnpluginFactory<PicklerPluginOptions | undefined> = (options = {}) => {
  let pipeline: TransformationPipeline | undefined;
  const verbose = options.verbose ?? false;
  const log = createLogger("unplugin", { verbose });

  return {
    name: "pickler",
    enforce: "pre",

    async buildStart() {
      await initHasher();
      const configPath = findTsConfig(process.cwd(), options.tsconfig);
      pipeline = createPipeline(configPath, { verbose });
      log.debug(`loaded config from ${configPath}`);
      log.debug(`program has ${pipeline.getFileNames().length} files`);
    },

    transformInclude(id) {
      return shouldTransform(id, options.include, options.exclude);
    },

    transform(_code, id) {
      if (!pipeline) return null;

      const result = pipeline.transform(id);
      reportDiagnostics(result.diagnostics);

      if (!result.changed) {
        return null;
      }
      log.debug(`expanded macros in ${id}`);
      return { code: result.code };
    },

    watchChange(id) {
      if (pipeline) {
        pipeline.invalidate(id);
        log.debug(`invalidated cache for ${id}`);
      }
    },

    buildEnd() {
      pipeline = undefined;
    },
  };
};

export const unplugin = /*#__PURE__*/ createUnplugin(unpluginFactory);
