import { existsSync, readFileSync } from "node:fs";
import { join, resolve as resolvePath } from "node:path";
import { z } from "zod";
import type { Logger } from "./logger";
import { describeError } from "./logger";

export const CONFIG_FILE_NAME = "db2sf.config.json";

export const ConfigSchema = z.object({
  input: z.string().min(1).optional(),
  extracted: z.string().min(1).optional(),
  converted: z.string().min(1).optional(),
  manifest: z.string().min(1).optional(),
  issues: z.string().min(1).optional(),
  report: z.string().min(1).optional(),
});

export type Db2sfConfig = z.infer<typeof ConfigSchema>;

export const DEFAULTS: Required<Db2sfConfig> = {
  input: "data/input",
  extracted: "data/output/original_db2_table_creation",
  converted: "data/output/new_snowflake_table_creation",
  manifest: "data/output/manifest.json",
  issues: "data/output/issues.txt",
  report: "data/output/report",
};

/**
 * Find and read `db2sf.config.json`. An explicit path wins; otherwise the
 * current directory, its parent and its grandparent are tried in turn.
 * Missing, unreadable or invalid files yield an empty config.
 */
export function loadConfig(
  logger: Logger,
  explicitPath?: string,
  cwd: string = process.cwd(),
): Db2sfConfig {
  if (explicitPath) {
    const path = resolvePath(cwd, explicitPath);
    if (existsSync(path)) {
      return readConfigFile(path, logger);
    }
    logger.warn(`Config file ${path} not found, using defaults.`);
    return {};
  }

  const candidates = [
    join(cwd, CONFIG_FILE_NAME),
    join(cwd, "..", CONFIG_FILE_NAME),
    join(cwd, "..", "..", CONFIG_FILE_NAME),
  ];
  const found = candidates.find((path) => existsSync(path));
  return found ? readConfigFile(found, logger) : {};
}

export function readConfigFile(path: string, logger: Logger): Db2sfConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    logger.error(`Failed to read config from ${path}, ignoring it: ${describeError(error)}`);
    return {};
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    logger.error(`Invalid config in ${path}, ignoring it: ${problems}`);
    return {};
  }
  return parsed.data;
}

/** Flag value, then config value, then the built-in default. */
export function pick<K extends keyof Db2sfConfig>(
  key: K,
  flag: string | undefined,
  config: Db2sfConfig,
): string {
  return flag ?? config[key] ?? DEFAULTS[key];
}
