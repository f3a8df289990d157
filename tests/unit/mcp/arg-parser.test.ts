/**
 * Tests for the MCP argument parser - type-safe extraction of arguments
 * from the Record<string, unknown> provided by MCP tool calls.
 */
import { describe, it, expect } from 'vitest';
import { getNumber, getString, getStringArrayRequired, getStringRequired } from '../../../src/mcp/arg-parser.js';

// ---------------------------------------------------------------------------
// getString
// ---------------------------------------------------------------------------
describe('getString', () => {
  it('should return a string value when present', () => {
    expect(getString({ query: 'users' }, 'query')).toBe('users');
  });

  it('should return undefined for missing key or undefined args', () => {
    expect(getString({ other: 'value' }, 'query')).toBeUndefined();
    expect(getString(undefined, 'query')).toBeUndefined();
  });

  it('should return undefined for non-string values', () => {
    expect(getString({ query: null }, 'query')).toBeUndefined();
    expect(getString({ query: 42 }, 'query')).toBeUndefined();
    expect(getString({ query: ['a'] }, 'query')).toBeUndefined();
  });

  it('should keep an empty string', () => {
    expect(getString({ query: '' }, 'query')).toBe('');
  });
});

// ---------------------------------------------------------------------------
// getStringRequired
// ---------------------------------------------------------------------------
describe('getStringRequired', () => {
  it('should return the value when present', () => {
    expect(getStringRequired({ coordinate: 'L1.Q1.TECH.A[C1]' }, 'coordinate')).toBe('L1.Q1.TECH.A[C1]');
  });

  it('should throw when missing or not a string', () => {
    expect(() => getStringRequired({}, 'coordinate'))
      .toThrow('Required string argument "coordinate" is missing or not a string');
    expect(() => getStringRequired({ coordinate: 7 }, 'coordinate')).toThrow('"coordinate"');
  });
});

// ---------------------------------------------------------------------------
// getNumber
// ---------------------------------------------------------------------------
describe('getNumber', () => {
  it('should return numbers', () => {
    expect(getNumber({ limit: 5 }, 'limit')).toBe(5);
    expect(getNumber({ limit: 0 }, 'limit')).toBe(0);
  });

  it('should parse numeric strings', () => {
    expect(getNumber({ layer: '3' }, 'layer')).toBe(3);
    expect(getNumber({ layer: ' 2.5 ' }, 'layer')).toBe(2.5);
  });

  it('should return undefined for non-numeric values', () => {
    expect(getNumber({ layer: 'three' }, 'layer')).toBeUndefined();
    expect(getNumber({ layer: '' }, 'layer')).toBeUndefined();
    expect(getNumber({ layer: Number.NaN }, 'layer')).toBeUndefined();
    expect(getNumber({ layer: true }, 'layer')).toBeUndefined();
    expect(getNumber(undefined, 'layer')).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// getStringArrayRequired
// ---------------------------------------------------------------------------
describe('getStringArrayRequired', () => {
  it('should return the strings in order', () => {
    expect(getStringArrayRequired({ coordinates: ['a', 'b'] }, 'coordinates')).toEqual(['a', 'b']);
    expect(getStringArrayRequired({ coordinates: [] }, 'coordinates')).toEqual([]);
  });

  it('should throw when missing or not an array', () => {
    expect(() => getStringArrayRequired({}, 'coordinates'))
      .toThrow('Required array argument "coordinates" is missing or not an array');
    expect(() => getStringArrayRequired({ coordinates: 'L1.Q1.TECH.A[C1]' }, 'coordinates'))
      .toThrow('Required array argument "coordinates" is missing or not an array');
  });

  it('should throw when an element is not a string', () => {
    expect(() => getStringArrayRequired({ coordinates: ['a', 3] }, 'coordinates'))
      .toThrow('Argument "coordinates" must contain only strings');
  });
});
