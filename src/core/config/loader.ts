/**
 * Project configuration loading.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config, type TargetConfig } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.docstamp/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : getConfigPath(projectRoot);

  const exists = await fileExists(fullPath);

  if (!exists) {
    // An explicitly named config file must exist
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.INVALID_CONFIG,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.INVALID_CONFIG,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Check if a config file exists in the project.
 */
export async function configExists(projectRoot: string): Promise<boolean> {
  return fileExists(getConfigPath(projectRoot));
}

/**
 * Pick targets by name, preserving the requested order.
 * An empty `names` list selects every target.
 */
export function selectTargets(config: Config, names: readonly string[] = []): TargetConfig[] {
  if (names.length === 0) {
    return [...config.targets];
  }
  return names.map((name) => {
    const target = config.targets.find((t) => t.name === name);
    if (!target) {
      const known = config.targets.map((t) => t.name).join(', ') || '(none)';
      throw new ConfigError(
        ErrorCodes.UNKNOWN_TARGET,
        `Unknown target '${name}'. Configured targets: ${known}`,
        { target: name }
      );
    }
    return target;
  });
}
