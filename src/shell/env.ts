import { isAbsolute } from 'path';
import { commandProcessFailed } from '../shared/errors.js';

export interface ChildEnv {
  env: Record<string, string>;
  // false when `env` is the complete environment rather than additions to process.env
  extendEnv: boolean;
}

/**
 * Turns `KEY=VALUE` entries into the environment handed to the child.
 *
 * Empty entries are skipped and a later entry for the same key replaces an earlier one.
 * A leading `=` belongs to the key (Windows keeps per-drive directories as `=C:=C:\dir`).
 */
export function parseEnv(command: string, entries: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const entry of entries) {
    if (entry === '') continue;
    const eq = entry.indexOf('=', 1);
    if (eq < 0) {
      throw commandProcessFailed(command, new Error(`invalid environment variable: ${entry}`));
    }
    env[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return env;
}

export function buildEnv(command: string, entries: readonly string[] | undefined, dir: string | undefined): ChildEnv {
  if (entries !== undefined) {
    return { env: parseEnv(command, entries), extendEnv: false };
  }
  // Inherited environment: keep PWD in step with an explicit absolute working directory.
  if (dir && isAbsolute(dir)) {
    return { env: { PWD: dir }, extendEnv: true };
  }
  return { env: {}, extendEnv: true };
}
