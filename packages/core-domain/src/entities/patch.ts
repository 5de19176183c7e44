import { ContractViolationError } from '../errors';
import type { FileEntry } from './file-entry';
import type { PatchOperation } from './patch-operation';

type PatchState = {
  path: string;
  virtualPath: string;
  file: FileEntry;
  operation: PatchOperation;
  digest?: string;
};

/**
 * One directory change: "create this file" or "delete this file", with the
 * virtual path the file takes under the alias it is mounted at.
 *
 * The patch owns a duplicate of the file it was built from. The content
 * digest is only computed for `create` patches, on `ensureDigest()`, and is
 * cached from then on.
 */
export class Patch {
  private state: PatchState | null;
  private pendingDigest: Promise<void> | null = null;

  constructor(path: string, file: FileEntry, operation: PatchOperation, alias: string) {
    if (alias.length === 0) {
      throw new ContractViolationError('patch alias must not be empty');
    }

    const filename = file.filename(path);
    if (filename.length === 0 || filename.startsWith('/')) {
      throw new ContractViolationError(
        `file "${filename}" does not resolve to a name under "${path}"`
      );
    }

    const virtualPath = alias.endsWith('/') ? `${alias}${filename}` : `${alias}/${filename}`;

    this.state = {
      path,
      virtualPath,
      file: file.dup(),
      operation,
    };
  }

  /** Copy of this patch. A cached digest is carried over, never computed. */
  duplicate(): Patch {
    const state = this.live();
    const copy: Patch = Object.create(Patch.prototype);
    copy.state = {
      path: state.path,
      virtualPath: state.virtualPath,
      file: state.file.dup(),
      operation: state.operation,
      digest: state.digest,
    };
    copy.pendingDigest = null;
    return copy;
  }

  get path(): string {
    return this.live().path;
  }

  get file(): FileEntry {
    return this.live().file;
  }

  get operation(): PatchOperation {
    return this.live().operation;
  }

  get virtualPath(): string {
    return this.live().virtualPath;
  }

  get digest(): string | undefined {
    return this.live().digest;
  }

  get destroyed(): boolean {
    return this.state === null;
  }

  /**
   * Computes and caches the file digest for `create` patches. Later calls
   * keep the cached value even if the file has changed since. No-op for
   * `delete` patches.
   */
  async ensureDigest(): Promise<void> {
    const state = this.live();
    if (state.operation !== 'create' || state.digest !== undefined) return;

    if (!this.pendingDigest) {
      this.pendingDigest = state.file
        .digest()
        .then((value) => {
          if (state.digest === undefined) state.digest = value;
        })
        .finally(() => {
          this.pendingDigest = null;
        });
    }

    await this.pendingDigest;
  }

  destroy(): void {
    if (!this.state) return;
    this.state.file.destroy();
    this.state = null;
  }

  private live(): PatchState {
    if (!this.state) {
      throw new ContractViolationError('patch used after destroy()');
    }
    return this.state;
  }
}
