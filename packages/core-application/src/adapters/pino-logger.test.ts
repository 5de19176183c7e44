import { describe, it, expect } from "vitest";
import { createPinoLogger } from "./pino-logger";

function memoryDestination() {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
}

describe("createPinoLogger", () => {
  it("writes structured json entries with the level label", () => {
    const dest = memoryDestination();
    const logger = createPinoLogger({ level: "info", format: "json", source: "watcher" }, dest);

    logger.info("patch detected", { virtualPath: "/vault/a.md" });

    expect(dest.lines).toHaveLength(1);
    expect(dest.lines[0]).toMatchObject({
      level: "info",
      msg: "patch detected",
      source: "watcher",
      virtualPath: "/vault/a.md",
    });
  });

  it("drops entries below the configured level", () => {
    const dest = memoryDestination();
    const logger = createPinoLogger({ level: "warn", format: "json" }, dest);

    logger.debug("noise");
    logger.info("still noise");
    logger.warn("kept");

    expect(dest.lines.map((l) => l.msg)).toEqual(["kept"]);
  });

  it("carries child bindings", () => {
    const dest = memoryDestination();
    const logger = createPinoLogger({ level: "debug", format: "json" }, dest);

    logger.child({ alias: "/vault" }).debug("hello");

    expect(dest.lines[0]).toMatchObject({ level: "debug", alias: "/vault", msg: "hello" });
  });
});
