// Public API exports for the core-application package: ports, config,
// services and the node-specific adapters.

// Ports (interfaces)
export type { LogLevel, LogFormat, LogContext, Logger } from "./ports/logger";
export type { DigestAlgorithm, FileHash, FileHasher } from "./ports/file-hasher";
export type { PatchWatcher, PatchWatcherOptions } from "./ports/patch-watcher";

// Config & errors
export * from "./config/load-config";
export * from "./application/errors";

// Services
export * from "./services/patch-list";

// Node adapters (optional for consumers who run in a Node environment)
export * from "./adapters/node-file-hasher";
export * from "./adapters/node-file-entry";
export * from "./adapters/pino-logger";
export * from "./adapters/chokidar-patch-watcher";
export * from "./adapters/sync-ignore";
export * from "./adapters/node-runtime";
