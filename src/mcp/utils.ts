/**
 * Project root detection for the MCP server.
 */
import { resolve } from 'node:path';

export const PROJECT_ROOT_ENV = 'SEALSTACK_PROJECT_ROOT';

/**
 * Project root, in order: SEALSTACK_PROJECT_ROOT, the `--project` option,
 * the working directory.
 */
export function getDefaultProjectRoot(
  projectOption?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const fromEnv = env[PROJECT_ROOT_ENV];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  if (projectOption) {
    return resolve(projectOption);
  }
  return process.cwd();
}
