export type PatchOperation = 'create' | 'delete';
