/**
 * Configuration loading and data-path resolution.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.sealstack/config.yaml';

/** Value of `vocabulary` that turns the vocabulary off. */
export const NO_VOCABULARY = 'none';

/**
 * Bundled data directory (src/core/config -> package root -> data).
 */
export function getBundledDataDir(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, '..', '..', '..', 'data');
}

/**
 * Defaults used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration, falling back to defaults when the file is missing.
 *
 * The file only names data locations and tuning knobs (`patterns`,
 * `vocabulary`, `search.limit`, `assembly.default_entity`); the paths stay
 * relative here and are resolved against the project root by
 * resolvePatternsPath() and resolveVocabularyPath().
 *
 * @throws ConfigError (CONFIG_LOAD_ERROR) for unreadable, unparsable or invalid files
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : getConfigPath(projectRoot);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Absolute pattern table path for a config.
 */
export function resolvePatternsPath(config: Config, projectRoot: string): string {
  return config.patterns
    ? path.resolve(projectRoot, config.patterns)
    : path.join(getBundledDataDir(), 'patterns', 'tech.yaml');
}

/**
 * Absolute vocabulary path for a config, or undefined when disabled.
 */
export function resolveVocabularyPath(config: Config, projectRoot: string): string | undefined {
  if (config.vocabulary === NO_VOCABULARY) return undefined;
  return config.vocabulary
    ? path.resolve(projectRoot, config.vocabulary)
    : path.join(getBundledDataDir(), 'vocabulary.yaml');
}
