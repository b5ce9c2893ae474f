import { commandNotFound } from '../shared/errors.js';
import type { Cmd, Result, Shell } from './types.js';

export type FakeResponse =
  | Partial<Result>
  | Error
  | ((cmd: Cmd) => Partial<Result> | Promise<Partial<Result>>);

/**
 * Scripted Shell for tests of code that runs commands.
 *
 * Responses are consumed in order. A call with nothing queued rejects with
 * COMMAND_NOT_FOUND so an unexpected command fails the test instead of passing silently.
 */
export class FakeShell implements Shell {
  readonly calls: Cmd[] = [];
  private readonly queue: FakeResponse[];

  constructor(...responses: FakeResponse[]) {
    this.queue = [...responses];
  }

  respond(...responses: FakeResponse[]): this {
    this.queue.push(...responses);
    return this;
  }

  get pending(): number {
    return this.queue.length;
  }

  async run(cmd: Cmd): Promise<Result> {
    this.calls.push({
      ...cmd,
      ...(cmd.args && { args: [...cmd.args] }),
      ...(cmd.env && { env: [...cmd.env] }),
    });

    const response = this.queue.shift();
    if (response === undefined) {
      throw commandNotFound(cmd.command, new Error('no scripted response left'));
    }
    if (response instanceof Error) {
      throw response;
    }
    const partial = typeof response === 'function' ? await response(cmd) : response;
    return {
      exitCode: 0,
      stdout: Buffer.alloc(0),
      stderr: Buffer.alloc(0),
      ...partial,
    };
  }
}
