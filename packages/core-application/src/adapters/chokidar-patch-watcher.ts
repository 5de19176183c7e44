import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "path";
import { Patch, type PatchOperation } from "@dir-patch/core-domain";
import type { PatchWatcher, PatchWatcherOptions } from "../ports/patch-watcher";
import type { FileHasher } from "../ports/file-hasher";
import type { Logger } from "../ports/logger";
import { NodeFileEntry } from "./node-file-entry";

/**
 * Turns chokidar events under `rootDir` into patches mounted at `alias`.
 * A changed file is reported as a delete followed by a create.
 */
export class ChokidarPatchWatcher implements PatchWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((patch: Patch) => void) | null = null;

  constructor(
    private readonly hasher: FileHasher,
    private readonly logger: Logger
  ) {}

  onPatch(handler: (patch: Patch) => void): void {
    this.handler = handler;
  }

  async start(options: PatchWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const rootDir = path.resolve(options.rootDir);
    const log = this.logger.child({ rootDir, alias: options.alias });

    this.watcher = chokidar.watch(rootDir, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 250,
        pollInterval: 50,
      },
      ignored: (p: string) => options.ignore(path.resolve(p)),
    });

    const emit = (operations: PatchOperation[], filePath: string) => {
      if (!this.handler) return;

      const file = new NodeFileEntry(undefined, path.resolve(filePath), this.hasher);
      try {
        for (const operation of operations) {
          const patch = new Patch(rootDir, file, operation, options.alias);
          log.debug("patch detected", { operation, virtualPath: patch.virtualPath });
          this.handler(patch);
        }
      } finally {
        file.destroy();
      }
    };

    this.watcher
      .on("add", (p: string) => emit(["create"], p))
      .on("change", (p: string) => emit(["delete", "create"], p))
      .on("unlink", (p: string) => emit(["delete"], p))
      .on("error", (err: unknown) => log.error("watcher error", { error: err }));
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
