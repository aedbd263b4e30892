import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.springinit.yaml';
export const SERVICE_URL_ENV = 'SPRINGINIT_SERVICE_URL';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration for a working directory.
 *
 * An explicit `configPath` must exist; the default file is optional.
 * The service URL environment variable wins over both.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);
  const exists = await fileExists(fullPath);

  if (!exists && configPath) {
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${fullPath}`, {
      path: fullPath,
    });
  }

  const config = exists ? await loadYamlWithSchema(fullPath, ConfigSchema) : getDefaultConfig();

  const override = env[SERVICE_URL_ENV]?.trim();
  return override ? mergeConfig({ ...config, service_url: override }) : config;
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  const result = ConfigSchema.safeParse(partial);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid configuration: ${result.error.issues.map((issue) => issue.message).join('; ')}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}
