// Library diagnostics go to stderr so they never mix with a host program's stdout.
import pino, { type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino(
  {
    name: 'shellout',
    level: process.env['SHELLOUT_LOG_LEVEL'] ?? 'warn',
  },
  pino.destination({ dest: 2, sync: true })
);
