import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { RemapConfig, PartialRemapConfig, ConfigError } from "../types";
import { RemapConfigSchema, PartialRemapConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("colremap", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<RemapConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return RemapConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialRemapConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadCustomConfig(userConfigPath);
}

async function loadCustomConfig(configPath: string): Promise<PartialRemapConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialRemapConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: RemapConfig,
  override: PartialRemapConfig,
): RemapConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    scheduler: { ...base.scheduler, ...override.scheduler },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: RemapConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom config that fails to load is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadCustomConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
