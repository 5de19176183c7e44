import path from "node:path";
import { ContractViolationError, DigestError, type FileEntry } from "@dir-patch/core-domain";
import type { FileHasher } from "../ports/file-hasher";

export function toPosixPath(inputPath: string): string {
  return inputPath.replace(/\\/g, "/");
}

/**
 * FileEntry backed by a path on the local disk. Entries only carry names;
 * duplicating one never touches the file itself.
 */
export class NodeFileEntry implements FileEntry {
  private readonly fullname: string;
  private destroyed = false;

  constructor(dirPath: string | undefined, name: string, private readonly hasher: FileHasher) {
    this.fullname = toPosixPath(dirPath ? path.posix.join(toPosixPath(dirPath), toPosixPath(name)) : name);
  }

  dup(): NodeFileEntry {
    this.assertLive();
    return new NodeFileEntry(undefined, this.fullname, this.hasher);
  }

  filename(dirPath?: string): string {
    this.assertLive();
    if (dirPath === undefined) return this.fullname;

    const rel = path.posix.relative(toPosixPath(dirPath), this.fullname);
    if (rel === "" || rel === ".." || rel.startsWith("../") || path.posix.isAbsolute(rel)) {
      throw new ContractViolationError(`${this.fullname} is not inside ${dirPath}`);
    }
    return rel;
  }

  async digest(): Promise<string> {
    this.assertLive();
    try {
      const hash = await this.hasher.hashFile(path.resolve(this.fullname));
      return hash.value;
    } catch (err) {
      throw new DigestError(`unable to digest ${this.fullname}`, this.fullname, err);
    }
  }

  destroy(): void {
    this.destroyed = true;
  }

  private assertLive(): void {
    if (this.destroyed) {
      throw new ContractViolationError(`file entry ${this.fullname} used after destroy()`);
    }
  }
}
