import { describe, it, expect } from "vitest";
import { ConfigError } from "../application/errors";
import { loadConfig } from "./load-config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      logger: { level: "info", format: "json" },
      digestAlgorithm: "sha1",
    });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ DIR_PATCH_LOG_LEVEL: "" }).logger.level).toBe("info");
  });

  it("reads every setting from the environment", () => {
    const config = loadConfig({
      DIR_PATCH_LOG_LEVEL: "debug",
      DIR_PATCH_LOG_FORMAT: "pretty",
      DIR_PATCH_DIGEST_ALGORITHM: "sha256",
    });

    expect(config).toEqual({
      logger: { level: "debug", format: "pretty" },
      digestAlgorithm: "sha256",
    });
  });

  it("lists every invalid setting", () => {
    let caught: unknown;
    try {
      loadConfig({ DIR_PATCH_LOG_LEVEL: "loud", DIR_PATCH_DIGEST_ALGORITHM: "md5" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = (caught as ConfigError).issues;
    expect(issues).toHaveLength(2);
    expect(issues[0].startsWith("DIR_PATCH_LOG_LEVEL: ")).toBe(true);
    expect(issues[1].startsWith("DIR_PATCH_DIGEST_ALGORITHM: ")).toBe(true);
  });
});
