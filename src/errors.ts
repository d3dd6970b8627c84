export enum UpdateErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  SCRIPT_NOT_FOUND = 'SCRIPT_NOT_FOUND',
  SCRIPT_FAILED = 'SCRIPT_FAILED',
  GIT_ERROR = 'GIT_ERROR',
  PUSH_FAILED = 'PUSH_FAILED',
}

export class UpdateError extends Error {
  readonly code: UpdateErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: UpdateErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'UpdateError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Render an error for `core.setFailed`, appending captured stderr when present.
 */
export function describeError(error: unknown): string {
  if (error instanceof UpdateError) {
    const stderr = error.context?.['stderr'];
    if (typeof stderr === 'string' && stderr.trim()) {
      return `${error.message}\n${stderr.trim()}`;
    }
    return error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'An unexpected error occurred';
}
