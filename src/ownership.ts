/**
 * Single-owner bookkeeping for tree nodes. A node is attached to at most one
 * parent, and is unusable once released.
 */

import { TomlStateError } from './errors.js';
import type { TomlValue } from './value.js';

export abstract class OwnedNode {
  private parent: OwnedNode | undefined = undefined;
  private released = false;

  /** Short name used in error messages. */
  protected abstract get label(): string;

  /** Releases owned children; called once from `dispose()`. */
  protected abstract releaseChildren(): void;

  get isDisposed(): boolean {
    return this.released;
  }

  /** True once this node has been attached to a container. */
  get isOwned(): boolean {
    return this.parent !== undefined;
  }

  /**
   * Releases this node and everything it owns. Any later use, including a
   * second `dispose()`, fails with `UseAfterRelease`. A node attached to a
   * container is released with it and cannot be disposed on its own.
   */
  dispose(): void {
    if (this.parent !== undefined) {
      throw new TomlStateError('AlreadyOwned', `${this.label} is owned by a container; dispose the container`);
    }
    this.release();
  }

  private release(): void {
    this.assertLive();
    this.releaseChildren();
    this.released = true;
  }

  protected releaseOwned(child: OwnedNode): void {
    child.release();
  }

  /** Releases the container an array or table value owns; scalars hold nothing to release. */
  protected releaseValue(value: TomlValue): void {
    if (value.kind === 'array') this.releaseOwned(value.array);
    else if (value.kind === 'table') this.releaseOwned(value.table);
  }

  protected assertLive(): void {
    if (this.released) {
      throw new TomlStateError('UseAfterRelease', `${this.label} has been disposed`);
    }
  }

  /** Fails as `adopt(child)` would, without attaching anything. */
  protected assertAdoptable(child: OwnedNode): void {
    this.assertLive();
    child.assertLive();
    if (child.parent !== undefined) {
      throw new TomlStateError('AlreadyOwned', `${child.label} already belongs to another container`);
    }
    for (let node: OwnedNode | undefined = this; node !== undefined; node = node.parent) {
      if (node === child) {
        throw new TomlStateError('AlreadyOwned', `${child.label} cannot contain itself`);
      }
    }
  }

  protected adopt(child: OwnedNode): void {
    this.assertAdoptable(child);
    child.parent = this;
  }

  protected assertValueAdoptable(value: TomlValue): void {
    if (value.kind === 'array') this.assertAdoptable(value.array);
    else if (value.kind === 'table') this.assertAdoptable(value.table);
  }

  /** Adopts the container carried by an array or table value. */
  protected adoptValue(value: TomlValue): void {
    if (value.kind === 'array') this.adopt(value.array);
    else if (value.kind === 'table') this.adopt(value.table);
  }
}
