/**
 * Tests for config schema Zod validation.
 */
import { describe, it, expect } from 'vitest';
import { ConfigSchema, LogLevelSchema } from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should coerce a numeric version to a string', () => {
    expect(ConfigSchema.parse({ version: 1.5 }).version).toBe('1.5');
  });

  it('should apply nested defaults for null sections', () => {
    const config = ConfigSchema.parse({ logging: null, search: null, assembly: null });

    expect(config.logging.level).toBe('info');
    expect(config.search.limit).toBe(20);
    expect(config.assembly.default_entity).toBe('item');
  });

  it('should keep partial sections', () => {
    expect(ConfigSchema.parse({ search: { limit: 3 } }).search).toEqual({ limit: 3 });
  });

  it('should reject a non-positive search limit', () => {
    expect(ConfigSchema.safeParse({ search: { limit: 0 } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ search: { limit: 2.5 } }).success).toBe(false);
  });

  it('should reject an empty default entity', () => {
    expect(ConfigSchema.safeParse({ assembly: { default_entity: '' } }).success).toBe(false);
  });

  it('should reject an empty patterns path', () => {
    expect(ConfigSchema.safeParse({ patterns: '' }).success).toBe(false);
  });
});

describe('LogLevelSchema', () => {
  it('should accept the logger levels', () => {
    for (const level of ['debug', 'info', 'warn', 'error', 'silent']) {
      expect(LogLevelSchema.parse(level)).toBe(level);
    }
  });

  it('should reject unknown levels', () => {
    expect(LogLevelSchema.safeParse('verbose').success).toBe(false);
  });
});
