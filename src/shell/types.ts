import type { Readable } from 'stream';

/**
 * Everything needed to start a command process.
 * The runner copies what it uses and never mutates a Cmd.
 */
export interface Cmd {
  /** Name looked up on PATH, or a path (anything containing a separator is used as given). */
  readonly command: string;
  readonly args?: readonly string[];
  /**
   * `KEY=VALUE` entries. Absent: the child inherits this process's environment.
   * Present, even empty: the child sees exactly these variables.
   */
  readonly env?: readonly string[];
  /** Working directory; absent or empty means this process's current directory. */
  readonly dir?: string;
  /** Standard input. Absent means the null device. */
  readonly stdin?: Readable | Uint8Array | string;
}

/** The outcome of a command that ran. A non-zero exit code is still a Result. */
export interface Result {
  readonly exitCode: number;
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  /** Set when the child was terminated by a signal; exitCode is then -1. */
  readonly signal?: NodeJS.Signals;
}

export interface Shell {
  /**
   * Runs the command to completion and captures its output.
   *
   * Rejects with a ShellError when the command cannot be resolved or the process
   * cannot be started. Never rejects because of the exit code.
   */
  run(cmd: Cmd): Promise<Result>;
}
