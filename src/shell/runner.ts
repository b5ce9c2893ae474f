// The one place the library touches the OS process table. Everything else in
// src/shell prepares a Cmd for this module or stands in for it in tests.
import { spawn } from 'child_process';
import { Readable, type Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { commandProcessFailed, errorCode, isShellError } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../shared/logger.js';
import { buildEnv } from './env.js';
import { lookPath } from './resolver.js';
import type { Cmd, Result, Shell } from './types.js';
import { parseCmd } from './validate.js';

export interface ProcessShellOptions {
  logger?: Logger;
  /** Environment whose PATH is searched for bare command names. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

// Errors a child causes by exiting before it has read all of its input.
const CLOSED_STDIN_CODES = new Set(['EPIPE', 'ERR_STREAM_PREMATURE_CLOSE', 'ERR_STREAM_DESTROYED']);

/** Shell backed by real child processes. Holds no per-call state; one instance serves concurrent calls. */
export class ProcessShell implements Shell {
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv | undefined;
  private readonly platform: NodeJS.Platform | undefined;

  constructor(options: ProcessShellOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.env = options.env;
    this.platform = options.platform;
  }

  async run(input: Cmd): Promise<Result> {
    let cmd: Cmd | undefined;
    try {
      cmd = parseCmd(input);
      return await this.execute(cmd);
    } catch (err) {
      const command = cmd?.command ?? '';
      const failure = isShellError(err) ? err : commandProcessFailed(command, err);
      this.logger.debug({ command, code: failure.code, err: failure.cause }, 'command failed');
      throw failure;
    }
  }

  private execute(cmd: Cmd): Promise<Result> {
    if (cmd.command === '') {
      throw commandProcessFailed(cmd.command, new Error('no command'));
    }

    const file = lookPath(cmd.command, this.env ?? process.env, this.platform ?? process.platform);
    const args = [...(cmd.args ?? [])];
    const dir = cmd.dir || undefined;
    const { env, extendEnv } = buildEnv(cmd.command, cmd.env, dir);

    this.logger.debug({ command: cmd.command, file, args, dir }, 'spawning command');

    // Throws synchronously for arguments the OS can never accept (e.g. NUL bytes);
    // run() classifies that as a process failure.
    const child = spawn(file, args, {
      cwd: dir,
      env: extendEnv ? { ...process.env, ...env } : env,
      stdio: [cmd.stdin === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      shell: false,
      windowsHide: true,
    });

    const feeding: Promise<unknown> =
      cmd.stdin !== undefined && child.stdin ? feedStdin(cmd.stdin, child.stdin) : Promise.resolve(undefined);

    return new Promise<Result>((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout.push(chunk);
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr.push(chunk);
      });

      // Emitted when the process could not be spawned; a 'close' with a negative code may follow.
      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        reject(commandProcessFailed(cmd.command, err));
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;

        const exitCode = code ?? -1;
        const outcome: Result = {
          exitCode,
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr),
          ...(signal !== null && { signal }),
        };

        feeding.then((stdinError) => {
          // An input error only counts against a clean exit; otherwise the exit status is reported.
          if (stdinError !== undefined && exitCode === 0 && signal === null) {
            reject(commandProcessFailed(cmd.command, stdinError));
            return;
          }
          this.logger.debug({ command: cmd.command, exitCode, signal }, 'command exited');
          resolve(outcome);
        }, reject);
      });
    });
  }
}

// Resolves to the error that interrupted the copy, or undefined once the input is delivered
// or the child stopped reading. Codes are checked structurally: errors raised by Node's
// streams may come from another realm (Jest's vm contexts) and fail `instanceof Error`.
async function feedStdin(source: Readable | Uint8Array | string, stdin: Writable): Promise<unknown> {
  const input = source instanceof Readable ? source : Readable.from([source]);
  try {
    await pipeline(input, stdin);
    return undefined;
  } catch (err) {
    const code = errorCode(err);
    return code !== undefined && CLOSED_STDIN_CODES.has(code) ? undefined : err;
  }
}

/** The stateless default instance. */
export const shell: Shell = new ProcessShell();

/** Runs `cmd` on the default instance. */
export function run(cmd: Cmd): Promise<Result> {
  return shell.run(cmd);
}

export function newShell(): Shell {
  return shell;
}
