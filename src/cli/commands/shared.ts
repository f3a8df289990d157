/**
 * Helpers shared by the CLI commands: option parsing and stack loading.
 */
import { InvalidArgumentError } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { loadSealStack } from '../../core/engine/loader.js';
import type { SealStack } from '../../core/engine/seal-stack.js';
import { isSealLayerNumber } from '../../core/seals/layers.js';
import type { SealLayerNumber } from '../../core/seals/types.js';
import { describeError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

export const DEFAULT_CONFIG = '.sealstack/config.yaml';

export interface CommonOptions {
  config: string;
  json?: boolean;
}

/**
 * Load config from the working directory and build the stack it names.
 */
export async function openSealStack(options: Pick<CommonOptions, 'config'>): Promise<SealStack> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  log.setLevel(config.logging.level);
  return loadSealStack(config, projectRoot);
}

/**
 * Report a failure and exit 1.
 */
export function exitWithError(error: unknown): never {
  log.error(describeError(error));
  process.exit(1);
}

export function parseLayerOption(value: string): SealLayerNumber {
  const layer = Number(value);
  if (!isSealLayerNumber(layer)) {
    throw new InvalidArgumentError('Layer must be an integer from 1 to 7.');
  }
  return layer;
}

export function parseLimitOption(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError('Limit must be a positive integer.');
  }
  return limit;
}
