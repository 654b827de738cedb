/**
 * @pickler/transformer - TypeScript transformer for converter derivation
 *
 * Expands `deriveReadWriter<T>()` calls and strips `@key` decorators. Use the
 * factory with any host that runs program-level transformers, or the
 * pipeline to transform files one at a time.
 */

import macroTransformerFactory from "./macro-transformer.js";

export default macroTransformerFactory;
export { macroTransformerFactory };

export {
  MacroTransformer,
  type MacroTransformerConfig,
  type TransformDiagnostic,
} from "./macro-transformer.js";

export {
  TransformationPipeline,
  createPipeline,
  transformCode,
  DEFAULT_COMPILER_OPTIONS,
  type PipelineOptions,
  type TransformResult,
} from "./pipeline.js";

export { TransformCache, DependencyGraph, hashContent, initHasher } from "./cache.js";
