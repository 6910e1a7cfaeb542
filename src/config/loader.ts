// Config loader: reads ~/.config/run-elevated/config.yaml (or RUN_ELEVATED_CONFIG)
// and lays it over the defaults. Never writes a file, not even on first run.
// Config shape is defined in src/types/config.ts; add new fields there, in
// DEFAULT_CONFIG and in configSchema.
import { readFileSync, existsSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { WrapperConfig } from "../types/config.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG: WrapperConfig = {
  privilege: { helper: "sudo", preserve_env_flag: "-E", degrade_without_helper: true },
};

const configSchema = z
  .object({
    privilege: z
      .object({
        helper: z.string().min(1),
        preserve_env_flag: z.string().min(1),
        degrade_without_helper: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export interface ConfigResult {
  config: WrapperConfig;
  configPath: string;
  /** False when the file was absent or rejected and defaults were used. */
  fromFile: boolean;
}

function defaults(configPath: string): ConfigResult {
  return { config: { privilege: { ...DEFAULT_CONFIG.privilege } }, configPath, fromFile: false };
}

export function loadConfig(configPath: string): ConfigResult {
  if (!existsSync(configPath)) {
    logger.debug({ configPath }, "No config file, using defaults");
    return defaults(configPath);
  }

  let raw: unknown;
  try {
    // An empty document parses to null; treat it as "no overrides".
    raw = parseYaml(readFileSync(configPath, "utf-8")) ?? {};
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to read config, using defaults");
    return defaults(configPath);
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error({ configPath, issues: parsed.error.issues }, "Invalid config, using defaults");
    return defaults(configPath);
  }

  const overrides = parsed.data.privilege ?? {};
  const config: WrapperConfig = {
    privilege: {
      helper: overrides.helper ?? DEFAULT_CONFIG.privilege.helper,
      preserve_env_flag: overrides.preserve_env_flag ?? DEFAULT_CONFIG.privilege.preserve_env_flag,
      degrade_without_helper: overrides.degrade_without_helper ?? DEFAULT_CONFIG.privilege.degrade_without_helper,
    },
  };
  logger.debug({ configPath, config }, "Config loaded");
  return { config, configPath, fromFile: true };
}
