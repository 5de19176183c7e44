/**
 * A file the sync layer refers to. Every handle is owned by whoever holds it:
 * `dup()` hands out a new, independently destroyable handle.
 */
export interface FileEntry {
  dup(): FileEntry;

  /** Name of the file relative to `dirPath`, or its full name when omitted. */
  filename(dirPath?: string): string;

  /** Hex content digest. Rejects with a DigestError when the file can't be read. */
  digest(): Promise<string>;

  destroy(): void;
}
