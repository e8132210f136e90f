/**
 * @arch codeout.core.domain
 */
import * as path from 'node:path';
import { ConfigSchema, type Config, type PartialConfig } from './schema.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { CodeoutError, ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.codeout.yaml';

type Toggle = 'enabled' | 'formatted' | 'notification';

const TOGGLES: readonly Toggle[] = ['enabled', 'formatted', 'notification'];

/** Environment variables that override the three feature toggles. */
export const ENV_TOGGLES: Readonly<Record<Toggle, string>> = {
  enabled: 'CODEOUT_ENABLED',
  formatted: 'CODEOUT_FORMATTED',
  notification: 'CODEOUT_NOTIFICATION',
};

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);
const FALSY = new Set(['0', 'false', 'no', 'off']);

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: PartialConfig): Config {
  const result = ConfigSchema.safeParse(partial);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Parse a toggle value from the environment.
 * Returns undefined for unset or unrecognised values.
 */
export function parseToggle(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return undefined;
}

/**
 * Apply CODEOUT_* toggles from the environment on top of a config.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv): Config {
  const overrides: Partial<Pick<Config, Toggle>> = {};
  for (const key of TOGGLES) {
    const value = parseToggle(env[ENV_TOGGLES[key]]);
    if (value !== undefined) {
      overrides[key] = value;
    }
  }
  return { ...config, ...overrides };
}

/**
 * Build a config from defaults and the environment only.
 * Reads no files.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  return applyEnvOverrides(getDefaultConfig(), env);
}

/**
 * Load configuration from a file, then apply environment overrides.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return applyEnvOverrides(getDefaultConfig(), env);
  }

  try {
    // An empty file parses to null
    const fromFile = await loadYamlWithSchema(fullPath, ConfigSchema.nullable());
    return applyEnvOverrides(fromFile ?? getDefaultConfig(), env);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(error.code, `${error.message} (file: ${fullPath})`, {
        ...error.details,
        path: fullPath,
      });
    }
    if (error instanceof CodeoutError) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
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
