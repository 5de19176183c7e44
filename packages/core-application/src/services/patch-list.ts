import { DigestError, type Patch } from "@dir-patch/core-domain";
import type { Logger } from "../ports/logger";

export type DigestFailure = {
  patch: Patch;
  error: DigestError;
};

/**
 * Duplicates the patches matching `predicate`. The source list is left
 * untouched and no digest is computed for the copies.
 */
export function selectPatches(
  patches: readonly Patch[],
  predicate: (patch: Patch) => boolean
): Patch[] {
  return patches.filter(predicate).map((p) => p.duplicate());
}

/**
 * Ensures the digest of every patch, one after the other. Unreadable files
 * are logged and reported back; any other error propagates.
 */
export async function digestPatches(
  patches: readonly Patch[],
  logger: Logger
): Promise<DigestFailure[]> {
  const failures: DigestFailure[] = [];

  for (const patch of patches) {
    try {
      await patch.ensureDigest();
    } catch (err) {
      if (!(err instanceof DigestError)) throw err;

      logger.warn("skipping patch with unreadable file", {
        virtualPath: patch.virtualPath,
        path: err.path,
        error: err.message,
      });
      failures.push({ patch, error: err });
    }
  }

  return failures;
}

export function destroyPatches(patches: Iterable<Patch>): void {
  for (const patch of patches) patch.destroy();
}
