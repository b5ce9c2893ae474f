export enum ShellErrorCode {
  COMMAND_NOT_FOUND = 'COMMAND_NOT_FOUND',
  COMMAND_PROCESS_FAILED = 'COMMAND_PROCESS_FAILED',
}

export class ShellError extends Error {
  readonly code: ShellErrorCode;

  constructor(code: ShellErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ShellError';
    this.code = code;
  }
}

// Matches on the code, never on the message. Omit `code` to match either kind.
export function isShellError(err: unknown, code?: ShellErrorCode): err is ShellError {
  return err instanceof ShellError && (code === undefined || err.code === code);
}

export function commandNotFound(command: string, cause: unknown): ShellError {
  return new ShellError(ShellErrorCode.COMMAND_NOT_FOUND, `Command not found: ${command}`, { cause });
}

// Structural so errors created in another realm (a vm context, a worker) still match.
export function errorCode(err: unknown): string | undefined {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
    ? err.code
    : undefined;
}

function errorMessage(err: unknown): string {
  return typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string'
    ? err.message
    : String(err);
}

export function commandProcessFailed(command: string, cause: unknown): ShellError {
  const reason = errorMessage(cause);
  return new ShellError(
    ShellErrorCode.COMMAND_PROCESS_FAILED,
    `Command process failed: ${command || '<empty>'}: ${reason}`,
    { cause }
  );
}
