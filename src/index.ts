export type { Cmd, Result, Shell } from './shell/types.js';
export { ProcessShell, shell, run, newShell } from './shell/runner.js';
export type { ProcessShellOptions } from './shell/runner.js';
export { FakeShell } from './shell/fake.js';
export type { FakeResponse } from './shell/fake.js';
export { lookPath } from './shell/resolver.js';
export { buildEnv, parseEnv } from './shell/env.js';
export { parseCmd } from './shell/validate.js';
export { ShellError, ShellErrorCode, isShellError } from './shared/errors.js';
export { logger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';
