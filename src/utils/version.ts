/**
 * Package version, read once from package.json beside src/ (or dist/).
 */
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

let cached: string | undefined;

export function getPackageVersion(): string {
  if (cached === undefined) {
    const here = dirname(fileURLToPath(import.meta.url));
    const content = readFileSync(resolve(here, '..', '..', 'package.json'), 'utf-8');
    cached = PackageJsonSchema.parse(JSON.parse(content)).version;
  }
  return cached;
}
