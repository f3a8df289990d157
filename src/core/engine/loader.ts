/**
 * Builds a SealStack from configured files, once per loader.
 */
import { resolvePatternsPath, resolveVocabularyPath } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { logger } from '../../utils/logger.js';
import { loadPatternTable } from '../patterns/loader.js';
import { loadVocabulary } from '../query/vocabulary.js';
import { SealStack } from './seal-stack.js';

const log = logger.child('engine');

export type SealStackLoader = () => Promise<SealStack>;

/**
 * Load a SealStack from the pattern table and vocabulary named by `config`.
 */
export async function loadSealStack(config: Config, projectRoot: string): Promise<SealStack> {
  const patternsPath = resolvePatternsPath(config, projectRoot);
  const vocabularyPath = resolveVocabularyPath(config, projectRoot);

  const [table, vocabulary] = await Promise.all([
    loadPatternTable(patternsPath),
    vocabularyPath ? loadVocabulary(vocabularyPath) : Promise.resolve(undefined),
  ]);
  log.debug(`Pattern table ${table.source} (version ${table.version}): ${table.patterns.length} patterns`);

  return new SealStack(table.patterns, {
    vocabulary,
    searchLimit: config.search.limit,
    defaultEntity: config.assembly.default_entity,
  });
}

/**
 * Every call returns the same promise, so files are read at most once.
 * A failed load is not retried; callers see the same rejection.
 */
export function createSealStackLoader(config: Config, projectRoot: string): SealStackLoader {
  let pending: Promise<SealStack> | undefined;
  return () => {
    if (!pending) {
      pending = loadSealStack(config, projectRoot);
    }
    return pending;
  };
}
