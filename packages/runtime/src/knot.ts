import type { Tree } from "./tree.js";
import type { ReadWriter } from "./readwriter.js";
import { KnotError, PicklerError } from "./errors.js";

/**
 * Binding cell for one type inside a derivation session.
 *
 * A cell is handed out as a forward reference while its own type is still
 * being synthesized; it delegates to the finished converter once
 * {@link populate} has run. Calling `read`/`write` earlier is a `KnotError`.
 */
export class KnotCell implements ReadWriter<unknown> {
  private target: ReadWriter<unknown> | undefined;

  constructor(readonly typeName: string) {}

  get populated(): boolean {
    return this.target !== undefined;
  }

  populate(rw: ReadWriter<unknown>): void {
    if (this.target) {
      throw new PicklerError(`Converter for \`${this.typeName}\` is already bound`);
    }
    this.target = rw;
  }

  /** The finished converter; throws while the derivation is in flight. */
  resolved(): ReadWriter<unknown> {
    if (!this.target) throw new KnotError(this.typeName);
    return this.target;
  }

  read(tree: Tree): unknown {
    return this.resolved().read(tree);
  }

  write(value: unknown): Tree {
    return this.resolved().write(value);
  }
}
