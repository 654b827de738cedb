/**
 * Error hierarchy
 *
 * Two families, distinguished by when they happen:
 *
 * - {@link DerivationError}: the shape of a type cannot be turned into a
 *   converter. Raised at build time by the macro (as a diagnostic) and at
 *   registration time by a derivation session.
 * - {@link ConversionError}: a derived converter met data it cannot read.
 *   Raised per call to `read`; there is no partial decoding.
 */

export class PicklerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A forward reference was used before the derivation it points at finished. */
export class KnotError extends PicklerError {
  constructor(readonly typeName: string) {
    super(`Converter for \`${typeName}\` was used before its derivation completed`);
  }
}

// ============================================================================
// Derivation-Time Errors
// ============================================================================

/**
 * Base for errors about a type's shape. `code` matches the diagnostic
 * catalog entry the macro reports, and `args` fill its message template.
 */
export abstract class DerivationError extends PicklerError {
  abstract readonly code: number;
  readonly args: Readonly<Record<string, string>>;

  constructor(
    readonly typeName: string,
    message: string,
    readonly hint?: string,
    args: Record<string, string> = {},
  ) {
    super(message);
    this.args = { type: typeName, ...args };
  }
}

export class NotSealedError extends DerivationError {
  readonly code = 9701;

  constructor(typeName: string) {
    super(
      typeName,
      `\`${typeName}\` is an open hierarchy; only closed unions can be derived as sum types`,
      `declare a union of the concrete classes instead, e.g. \`type ${typeName}Value = A | B\``,
    );
  }
}

export class NoVariantsError extends DerivationError {
  readonly code = 9702;

  constructor(typeName: string, hint?: string) {
    super(
      typeName,
      `Sum type \`${typeName}\` has no alternatives`,
      hint ?? "a union must list at least one class or singleton",
    );
  }
}

export class NoConstructorError extends DerivationError {
  readonly code = 9703;

  constructor(typeName: string) {
    super(
      typeName,
      `Cannot construct \`${typeName}\`: no public constructor and no static \`of\` factory`,
      "make the constructor public or add `static of(...)` returning the class",
    );
  }
}

export class NoDeconstructorError extends DerivationError {
  readonly code = 9704;

  constructor(
    typeName: string,
    readonly field: string,
  ) {
    super(
      typeName,
      `Cannot read field \`${field}\` back out of \`${typeName}\``,
      `declare the parameter as \`readonly ${field}\`, or add \`static unapply(value)\` returning the fields`,
      { field },
    );
  }
}

export class MalformedAnnotationError extends DerivationError {
  readonly code = 9705;

  constructor(
    typeName: string,
    readonly detail: string,
  ) {
    super(
      typeName,
      `Malformed @key annotation on \`${typeName}\`: ${detail}`,
      'write the key as one string literal, e.g. @key("name")',
      { detail },
    );
  }
}

export class DuplicateKeyError extends DerivationError {
  readonly code = 9706;

  constructor(
    typeName: string,
    readonly key: string,
    readonly what: "field" | "tag",
  ) {
    super(
      typeName,
      `Duplicate ${what} \`${key}\` in \`${typeName}\``,
      what === "tag"
        ? "give one of the alternatives a distinct @key"
        : "rename one of the fields with @key",
      { key, what },
    );
  }
}

export class UnsupportedTypeError extends DerivationError {
  readonly code = 9707;

  constructor(
    typeName: string,
    readonly detail: string,
  ) {
    super(typeName, `Cannot derive a converter for \`${typeName}\`: ${detail}`, undefined, {
      detail,
    });
  }
}

// ============================================================================
// Conversion-Time Errors
// ============================================================================

export class ConversionError extends PicklerError {}

export class ExpectedObjectError extends ConversionError {
  constructor(
    readonly typeName: string,
    readonly found: string,
  ) {
    super(`Expected an object for \`${typeName}\`, found ${found}`);
  }
}

export class MissingFieldError extends ConversionError {
  constructor(readonly field: string) {
    super(`Missing field \`${field}\``);
  }
}

/**
 * A field was present but its value could not be read. Nested failures
 * accumulate into `path`, outermost key first; `rootCause` is the error
 * raised by the innermost reader.
 */
export class FieldTypeError extends ConversionError {
  readonly path: readonly string[];
  readonly rootCause: unknown;

  constructor(
    readonly field: string,
    cause: unknown,
  ) {
    const inner = cause instanceof FieldTypeError ? cause : undefined;
    const path = inner ? [field, ...inner.path] : [field];
    const rootCause = inner ? inner.rootCause : cause;
    super(`Invalid value at \`${path.join(".")}\`: ${messageOf(rootCause)}`, { cause });
    this.path = path;
    this.rootCause = rootCause;
  }
}

export class UnknownVariantError extends ConversionError {
  constructor(
    readonly tag: string,
    readonly known: readonly string[] = [],
  ) {
    super(
      known.length > 0
        ? `Unknown variant \`${tag}\` (expected one of: ${known.join(", ")})`
        : `Unknown variant \`${tag}\``,
    );
  }
}

/** A primitive or composite reader met a value of the wrong kind. */
export class InvalidDataError extends ConversionError {
  constructor(
    readonly expected: string,
    readonly found: string,
    options?: { cause?: unknown },
  ) {
    super(`Expected ${expected}, found ${found}`, options);
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
