import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Patch } from "@dir-patch/core-domain";
import type { Logger } from "../ports/logger";
import { ChokidarPatchWatcher } from "./chokidar-patch-watcher";
import { createNodeRuntime } from "./node-runtime";

describe("createNodeRuntime", () => {
  let root: string;
  let logger: Logger;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "dir-patch-runtime-"));
    await fs.writeFile(path.join(root, "hello.txt"), "hello");
    logger = {
      error: vi.fn(),
      warn: vi.fn(),
      info: vi.fn(),
      debug: vi.fn(),
      child: vi.fn(() => logger),
    };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("hashes with the configured algorithm", async () => {
    const runtime = createNodeRuntime(
      { logger: { level: "info", format: "json" }, digestAlgorithm: "sha256" },
      logger
    );
    const file = runtime.openFile(root, "hello.txt");
    const patch = new Patch(root, file, "create", "/");
    file.destroy();

    await patch.ensureDigest();

    expect(runtime.hasher.algorithm).toBe("sha256");
    expect(patch.digest).toBe("2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824");
  });

  it("builds watchers with a scoped logger", () => {
    const runtime = createNodeRuntime(
      { logger: { level: "info", format: "json" }, digestAlgorithm: "sha1" },
      logger
    );

    expect(runtime.createWatcher()).toBeInstanceOf(ChokidarPatchWatcher);
    expect(logger.child).toHaveBeenCalledWith({ component: "watcher" });
  });
});
