/**
 * ReadWriter Registry - named converters for types a plan does not describe
 *
 * Derived converters resolve every `named` type reference that has no shape
 * in the plan here: the primitives, `Date`, and anything the application
 * registers for its own leaf types.
 *
 * @example
 * ```typescript
 * const registry = createRegistry();
 * registry.register("URL", readWriter(
 *   (tree) => new URL(stringRW.read(tree)),
 *   (url) => Tree.str(url.href),
 * ));
 * ```
 */

import type { ReadWriter } from "./readwriter.js";
import { PRIMITIVES } from "./primitives.js";

/**
 * Duplicate handling strategy for registrations.
 */
export type DuplicateStrategy =
  | "error" // Throw on duplicate (default)
  | "skip" // Keep the existing entry
  | "replace"; // Overwrite the existing entry

export interface RegistryOptions {
  /** Start with the built-in primitives (default: true) */
  primitives?: boolean;

  /** How to handle a second registration under the same name (default: "error") */
  duplicateStrategy?: DuplicateStrategy;
}

export interface ReadWriterRegistry {
  register<A>(name: string, rw: ReadWriter<A>): void;
  get(name: string): ReadWriter<unknown> | undefined;
  has(name: string): boolean;
  names(): string[];
}

class ReadWriterRegistryImpl implements ReadWriterRegistry {
  private store = new Map<string, ReadWriter<unknown>>();
  private readonly duplicateStrategy: DuplicateStrategy;

  constructor(options: RegistryOptions = {}) {
    this.duplicateStrategy = options.duplicateStrategy ?? "error";
    if (options.primitives ?? true) {
      for (const [name, rw] of PRIMITIVES) this.store.set(name, rw);
    }
  }

  register<A>(name: string, rw: ReadWriter<A>): void {
    if (this.store.has(name)) {
      switch (this.duplicateStrategy) {
        case "error":
          throw new Error(`ReadWriterRegistry: converter for '${name}' already exists`);
        case "skip":
          return;
        case "replace":
          break;
      }
    }
    this.store.set(name, rw);
  }

  get(name: string): ReadWriter<unknown> | undefined {
    return this.store.get(name);
  }

  has(name: string): boolean {
    return this.store.has(name);
  }

  names(): string[] {
    return Array.from(this.store.keys());
  }
}

/** Create a new isolated registry (for testing or scoped usage) */
export function createRegistry(options?: RegistryOptions): ReadWriterRegistry {
  return new ReadWriterRegistryImpl(options);
}

/** Registry used by `deriveReadWriter` when none is passed */
export const defaultRegistry: ReadWriterRegistry = createRegistry();
