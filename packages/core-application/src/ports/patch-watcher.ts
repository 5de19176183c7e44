import type { Patch } from "@dir-patch/core-domain";

export type PatchWatcherOptions = {
  rootDir: string;
  alias: string;
  ignore: (path: string) => boolean;
};

export interface PatchWatcher {
  start(options: PatchWatcherOptions): Promise<void>;
  stop(): Promise<void>;

  /** The handler owns every patch it receives and must destroy it. */
  onPatch(handler: (patch: Patch) => void): void;
}
