/**
 * @pickler/derive
 *
 * Compile-time half of converter derivation: classifies types through the
 * checker, builds field plans and variant lists, and prints the plan the
 * runtime synthesizes converters from. Importing this module registers the
 * `deriveReadWriter` and `key` macros.
 */

import { globalRegistry, registerMacros } from "@pickler/core";
import { deriveReadWriterMacro, keyAttribute } from "./macros.js";

export { resolveKey, resolveDefault } from "./annotations.js";
export { classify } from "./classify.js";
export { buildParameterFields, buildPropertyFields } from "./fields.js";
export { enumerateVariants, type VariantSource } from "./variants.js";
export { toTypeRef } from "./typeref.js";
export { PlanWalker, resolveAlias, type DeriveEnv } from "./walker.js";
export { emitPlan } from "./emit.js";
export { deriveReadWriterMacro, keyAttribute, RUNTIME_MODULE } from "./macros.js";
export type {
  FieldModel,
  Construction,
  SumModel,
  SingletonModel,
  ProductModel,
  ShapeModel,
  PlanModel,
} from "./model.js";

registerMacros(globalRegistry, deriveReadWriterMacro, keyAttribute);
