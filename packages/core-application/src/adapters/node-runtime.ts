import { loadConfig, type DirPatchConfig } from "../config/load-config";
import type { FileHasher } from "../ports/file-hasher";
import type { Logger } from "../ports/logger";
import { ChokidarPatchWatcher } from "./chokidar-patch-watcher";
import { NodeFileEntry } from "./node-file-entry";
import { NodeFileHasher } from "./node-file-hasher";
import { createPinoLogger } from "./pino-logger";

export type NodeRuntime = {
  config: DirPatchConfig;
  logger: Logger;
  hasher: FileHasher;
  openFile(dirPath: string | undefined, name: string): NodeFileEntry;
  createWatcher(): ChokidarPatchWatcher;
};

export function createNodeRuntime(
  config: DirPatchConfig = loadConfig(),
  logger: Logger = createPinoLogger({ ...config.logger, source: "dir-patch" })
): NodeRuntime {
  const hasher = new NodeFileHasher(config.digestAlgorithm);

  return {
    config,
    logger,
    hasher,
    openFile: (dirPath, name) => new NodeFileEntry(dirPath, name, hasher),
    createWatcher: () => new ChokidarPatchWatcher(hasher, logger.child({ component: "watcher" })),
  };
}
