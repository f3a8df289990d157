import { describe, it, expect } from 'vitest';
import { getPackageVersion } from '../../../src/utils/version.js';

describe('getPackageVersion', () => {
  it('should read a semver version from package.json', () => {
    expect(getPackageVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });

  it('should return the cached value on later calls', () => {
    expect(getPackageVersion()).toBe(getPackageVersion());
  });
});
