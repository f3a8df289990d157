/**
 * Tests for building a SealStack from configured files.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createSealStackLoader, loadSealStack } from '../../../../src/core/engine/loader.js';
import { ConfigSchema } from '../../../../src/core/config/schema.js';
import { AssemblyError } from '../../../../src/utils/errors.js';

const PATTERNS = `
version: 3
patterns:
  - coordinate: L2.Q3.TECH.PYTHON.CONFIG.DATACLASS[C3]
    title: Dataclass model
    language: python
    tags: [model, schema]
    body: "class {Entity}: pass"
  - coordinate: L4.Q3.TECH.WEB.MIDDLEWARE.AUTH[C3]
    title: Auth middleware
    language: python
    tags: [auth, jwt]
    body: "def require_{entity}(): ..."
`;

const VOCABULARY = `
nouns: [user]
concepts:
  - name: user
    triggers: [user]
    layers:
      "2": [model]
      "4": [auth]
`;

describe('loadSealStack', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sealstack-engine-'));
    await fs.writeFile(path.join(dir, 'patterns.yaml'), PATTERNS);
    await fs.writeFile(path.join(dir, 'vocab.yaml'), VOCABULARY);
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads patterns and vocabulary relative to the project root', async () => {
    const config = ConfigSchema.parse({ patterns: 'patterns.yaml', vocabulary: 'vocab.yaml' });
    const stack = await loadSealStack(config, dir);

    expect(stack.stats().patterns).toBe(2);

    const result = stack.buildModule('users');
    expect(result.entity).toBe('user');
    expect(result.report.present).toEqual([2, 4]);
    expect(result.output).toContain('class User: pass');
  });

  it('runs without a vocabulary when set to "none"', async () => {
    const config = ConfigSchema.parse({ patterns: 'patterns.yaml', vocabulary: 'none' });
    const stack = await loadSealStack(config, dir);

    expect(() => stack.buildModule('users')).toThrow(AssemblyError);
  });

  it('applies search and assembly settings', async () => {
    const config = ConfigSchema.parse({
      patterns: 'patterns.yaml',
      vocabulary: 'none',
      search: { limit: 1 },
      assembly: { default_entity: 'widget' },
    });
    const stack = await loadSealStack(config, dir);

    expect(stack.search('')).toHaveLength(1);
    expect(stack.buildModule('').entity).toBe('widget');
  });

  it('rejects when the pattern table is missing', async () => {
    const config = ConfigSchema.parse({ patterns: 'missing.yaml', vocabulary: 'none' });

    await expect(loadSealStack(config, dir)).rejects.toThrow('Failed to read pattern table');
  });

  it('createSealStackLoader loads once', async () => {
    const config = ConfigSchema.parse({ patterns: 'patterns.yaml', vocabulary: 'none' });
    const load = createSealStackLoader(config, dir);

    const first = load();
    expect(load()).toBe(first);
    expect(await load()).toBe(await first);
  });
});
