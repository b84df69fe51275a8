/**
 * @fileoverview Playbook error codes and formatting for the CLI
 */

export type PlaybookErrorCode =
  | 'NOT_A_PLAYBOOK'
  | 'MISSING_RESOURCE'
  | 'INVALID_ARGUMENT'
  | 'LOAD_FAILED';

export class PlaybookError extends Error {
  constructor(
    message: string,
    public readonly code: PlaybookErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PlaybookError';
  }
}

export const ERROR_SUGGESTIONS: Record<PlaybookErrorCode, string> = {
  NOT_A_PLAYBOOK: 'Export a Step instance, or a Step subclass that takes no constructor arguments.',
  MISSING_RESOURCE: 'Check the path and run the playbook again.',
  INVALID_ARGUMENT: 'Run `playbook --help` for usage information.',
  LOAD_FAILED: 'Check the module path, or pass -L with the directory that contains it.',
};

export function createError(
  code: PlaybookErrorCode,
  message: string,
  details?: Record<string, unknown>,
): PlaybookError {
  return new PlaybookError(message, code, ERROR_SUGGESTIONS[code], details);
}

export function formatError(error: unknown): string {
  if (error instanceof PlaybookError && error.code === 'NOT_A_PLAYBOOK') {
    return error.message;
  }
  if (error instanceof PlaybookError) {
    const base = `Error [${error.code}]: ${error.message}`;
    return error.suggestion ? `${base}\n\nSuggestion: ${error.suggestion}` : base;
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

/** Exit status for an error escaping the CLI. */
export function getExitCode(error: unknown): number {
  if (error instanceof PlaybookError && error.code === 'INVALID_ARGUMENT') return 2;
  return 1;
}
