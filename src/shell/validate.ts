import { Readable } from 'stream';
import { z } from 'zod';
import { commandProcessFailed } from '../shared/errors.js';
import type { Cmd } from './types.js';

// Typed callers cannot get this wrong; untyped ones (plain JS, parsed JSON) can.
export const cmdSchema = z.object({
  command: z.string(),
  args: z.array(z.string()).optional(),
  env: z.array(z.string()).optional(),
  dir: z.string().optional(),
  stdin: z
    .union([z.instanceof(Readable), z.instanceof(Uint8Array), z.string()])
    .optional(),
});

/** Checks the runtime shape of a Cmd. Throws COMMAND_PROCESS_FAILED when it is malformed. */
export function parseCmd(input: unknown): Cmd {
  const parsed = cmdSchema.safeParse(input);
  if (!parsed.success) {
    const command =
      typeof input === 'object' && input !== null && 'command' in input && typeof input.command === 'string'
        ? input.command
        : '';
    throw commandProcessFailed(command, parsed.error);
  }
  return parsed.data;
}
