/**
 * @pickler/runtime
 *
 * Tree value model, converter synthesis and the knot-binding derivation
 * session. Has no dependency on the TypeScript compiler.
 */

export {
  Tree,
  fromJson,
  toJson,
  parse,
  stringify,
  type TreeObject,
  type TreeArray,
  type TreeString,
  type TreeNumber,
  type TreeBoolean,
  type TreeNull,
  type TreeKind,
  type JsonValue,
} from "./tree.js";

export {
  PicklerError,
  KnotError,
  DerivationError,
  NotSealedError,
  NoVariantsError,
  NoConstructorError,
  NoDeconstructorError,
  MalformedAnnotationError,
  DuplicateKeyError,
  UnsupportedTypeError,
  ConversionError,
  ExpectedObjectError,
  MissingFieldError,
  FieldTypeError,
  UnknownVariantError,
  InvalidDataError,
} from "./errors.js";

export {
  readWriter,
  validate,
  type Reader,
  type Writer,
  type ReadWriter,
} from "./readwriter.js";

export {
  numberRW,
  stringRW,
  booleanRW,
  nullRW,
  undefinedRW,
  unknownRW,
  bigintRW,
  dateRW,
} from "./primitives.js";

export {
  createRegistry,
  defaultRegistry,
  type ReadWriterRegistry,
  type RegistryOptions,
  type DuplicateStrategy,
} from "./registry.js";

export {
  t,
  field,
  product,
  sum,
  singleton,
  plan,
  type TypeRef,
  type LiteralValue,
  type FieldPlan,
  type FieldOptions,
  type ProductOptions,
  type SumShape,
  type SingletonShape,
  type ProductShape,
  type TypeShape,
  type PlanOptions,
  type DerivationPlan,
} from "./plan.js";

export { resolveTypeRef, type NamedLookup } from "./composite.js";
export { KnotCell } from "./knot.js";
export { synthesize, type SynthesisContext } from "./synthesize.js";
export { DerivationSession, DEFAULT_TAG_KEY, type SessionOptions } from "./session.js";

export {
  deriveReadWriter,
  fromPlan,
  key,
  readJson,
  writeJson,
  type DeriveOptions,
} from "./derive.js";
