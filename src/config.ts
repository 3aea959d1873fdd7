import { readFile } from "fs/promises";
import { join } from "path";
import { parse as parseYaml } from "yaml";
import { FILE_NAMES } from "./constants/ui.js";
import { WARNING_MESSAGES } from "./constants/messages.js";
import {
  CONFIG_ENV_VARS,
  GitCcConfigSchema,
  type ConfigKey,
} from "./schemas/validation.js";
import type { GitCcConfig } from "./types/common.js";
import { consoleLogger, type Logger } from "./utils/logger.js";

export type ConfigSource = "file" | "defaults";

export interface LoadedConfig {
  config: GitCcConfig;
  source: ConfigSource;
  path: string;
}

const CONFIG_KEYS = Object.keys(GitCcConfigSchema.shape).filter(
  (key): key is ConfigKey => key in CONFIG_ENV_VARS
);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Validates each key on its own: a bad value for one key is reported and
 * replaced by its default without discarding the rest of the file.
 */
export const normalizeConfig = (
  raw: Record<string, unknown>,
  logger: Logger = consoleLogger
): GitCcConfig => {
  const accepted: Record<string, unknown> = {};

  for (const key of CONFIG_KEYS) {
    if (raw[key] === undefined || raw[key] === null) {
      continue;
    }
    const result = GitCcConfigSchema.shape[key].safeParse(raw[key]);
    if (result.success) {
      accepted[key] = result.data;
    } else {
      logger.warn(
        `${WARNING_MESSAGES.CONFIG_INVALID_KEY} "${key}": ${result.error.issues
          .map((issue) => issue.message)
          .join(", ")}`
      );
    }
  }

  const validated = GitCcConfigSchema.parse(accepted);
  return {
    useDefaults: validated.use_defaults,
    customCommitTypes: validated.custom_commit_types,
    scopes: validated.scopes,
  };
};

export const readEnvOverrides = (
  env: NodeJS.ProcessEnv
): Record<string, unknown> => {
  const overrides: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[CONFIG_ENV_VARS[key]];
    if (value !== undefined) {
      overrides[key] = value;
    }
  }
  return overrides;
};

/**
 * Loads `.git-cc.yaml` from the repository root, overlaid with environment
 * variables. A missing or unparsable file yields the defaults.
 */
export const loadConfig = async (
  repositoryRoot: string,
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = consoleLogger
): Promise<LoadedConfig> => {
  const path = join(repositoryRoot, FILE_NAMES.CONFIG);
  let fileValues: Record<string, unknown> = {};
  let source: ConfigSource = "defaults";

  try {
    const content = await readFile(path, "utf-8");
    const parsed: unknown = parseYaml(content);
    if (isRecord(parsed)) {
      fileValues = parsed;
      source = "file";
    } else if (parsed !== null && parsed !== undefined) {
      logger.debug(`Error reading config file: ${path} is not a mapping`);
    }
  } catch (error) {
    logger.debug(`Error reading config file: ${error instanceof Error ? error.message : String(error)}`);
  }

  const config = normalizeConfig({ ...fileValues, ...readEnvOverrides(env) }, logger);
  return { config, source, path };
};
