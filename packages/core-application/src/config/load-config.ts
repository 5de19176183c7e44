import { z } from "zod";
import { ConfigError } from "../application/errors";

const configSchema = z.object({
  DIR_PATCH_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  DIR_PATCH_LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),
  DIR_PATCH_DIGEST_ALGORITHM: z.enum(["sha1", "sha256"]).default("sha1"),
});

export type DirPatchConfig = {
  logger: {
    level: z.infer<typeof configSchema>["DIR_PATCH_LOG_LEVEL"];
    format: z.infer<typeof configSchema>["DIR_PATCH_LOG_FORMAT"];
  };
  digestAlgorithm: z.infer<typeof configSchema>["DIR_PATCH_DIGEST_ALGORITHM"];
};

/**
 * Reads the library settings from environment variables. Unset variables
 * fall back to their defaults; anything else that doesn't parse is an error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DirPatchConfig {
  const parsed = configSchema.safeParse({
    DIR_PATCH_LOG_LEVEL: env.DIR_PATCH_LOG_LEVEL || undefined,
    DIR_PATCH_LOG_FORMAT: env.DIR_PATCH_LOG_FORMAT || undefined,
    DIR_PATCH_DIGEST_ALGORITHM: env.DIR_PATCH_DIGEST_ALGORITHM || undefined,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`invalid configuration (${issues.length} issue(s))`, issues, parsed.error);
  }

  return {
    logger: {
      level: parsed.data.DIR_PATCH_LOG_LEVEL,
      format: parsed.data.DIR_PATCH_LOG_FORMAT,
    },
    digestAlgorithm: parsed.data.DIR_PATCH_DIGEST_ALGORITHM,
  };
}
