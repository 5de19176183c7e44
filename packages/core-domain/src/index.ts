export * from './entities/patch';
export type { PatchOperation } from './entities/patch-operation';
export type { FileEntry } from './entities/file-entry';
export * from './errors';
