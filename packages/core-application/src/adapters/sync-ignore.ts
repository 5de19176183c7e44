import path from "node:path";

export const SYNC_DATA_DIR = ".dir-patch";

export function createSyncIgnore(rootDir: string) {
  const root = path.resolve(rootDir);

  return (absPath: string) => {
    const p = path.resolve(absPath);

    // o próprio root nunca é ignorado; fora dele, sempre
    if (p === root) return false;
    if (!p.startsWith(root + path.sep)) return true;

    const rel = path.relative(root, p).replaceAll("\\", "/");

    // Temporários comuns
    if (rel.endsWith("~")) return true;
    if (rel.endsWith(".tmp")) return true;
    if (rel.endsWith(".swp")) return true;
    if (rel.endsWith(".DS_Store")) return true;

    // dados internos do sync
    if (rel === SYNC_DATA_DIR || rel.startsWith(`${SYNC_DATA_DIR}/`)) return true;

    return false;
  };
}
