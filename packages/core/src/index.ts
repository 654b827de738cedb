/**
 * Core module exports for @pickler/core
 *
 * This package provides:
 * - Macro system infrastructure (types, registry, context)
 * - The diagnostic catalog and its renderers
 * - Configuration and logging shared by the transformer and the macros
 */

export * from "./registry.js";
export * from "./context.js";

// Configuration System
export {
  config,
  type PicklerConfig,
  type ResolvedConfig,
} from "./config.js";

// Logging
export { createLogger, type Logger, type LoggerOptions } from "./logger.js";

export type {
  MacroKind,
  MacroContext,
  MacroDefinition,
  MacroDefinitionBase,
  ExpressionMacro,
  AttributeMacro,
  AttributeTarget,
  MacroRegistry,
  MacroDiagnostic,
} from "./types.js";

// Diagnostics System
export * from "./diagnostics.js";

// AST Utilities
export {
  stripDecorator,
  stripPositions,
  decoratorName,
  decoratorArguments,
} from "./ast-utils.js";
