import { accessSync, constants, statSync } from 'fs';
import { posix, win32 } from 'path';
import { commandNotFound } from '../shared/errors.js';

const DEFAULT_WINDOWS_PATHEXT = ['.COM', '.EXE', '.BAT', '.CMD'];

export type ExecutableCheck = (path: string, platform: NodeJS.Platform) => boolean;

export function isExecutableFile(path: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    // Windows has no execute bit; the extension decides.
    if (platform !== 'win32') accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function hasPathSeparator(command: string, platform: NodeJS.Platform = process.platform): boolean {
  return command.includes('/') || (platform === 'win32' && command.includes('\\'));
}

/**
 * Resolves a bare command name to an executable on PATH.
 *
 * Commands containing a path separator are returned unchanged. Relative and empty
 * PATH entries are skipped, so a name never resolves through the current directory.
 * Throws COMMAND_NOT_FOUND when nothing matches.
 */
export function lookPath(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  isExecutable: ExecutableCheck = isExecutableFile
): string {
  if (hasPathSeparator(command, platform)) {
    return command;
  }

  const windows = platform === 'win32';
  const paths = windows ? win32 : posix;
  const pathValue = (windows ? env['Path'] ?? env['PATH'] : env['PATH']) ?? '';
  const dirs = pathValue
    .split(paths.delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0 && paths.isAbsolute(entry));

  const candidates =
    windows && !paths.extname(command) ? windowsExtensions(env).map((ext) => command + ext) : [command];

  for (const dir of dirs) {
    for (const name of candidates) {
      const candidate = paths.join(dir, name);
      if (isExecutable(candidate, platform)) {
        return candidate;
      }
    }
  }

  throw commandNotFound(command, new Error(`executable file not found in PATH: ${command}`));
}

function windowsExtensions(env: NodeJS.ProcessEnv): string[] {
  return (env['PATHEXT'] ?? DEFAULT_WINDOWS_PATHEXT.join(';'))
    .split(';')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}
