export enum ErrorCode {
  INVALID_RANGE = 'invalid_range',
  UNRECOGNIZED_FORMAT = 'unrecognized_format',
  MISSING_STORAGE = 'missing_storage',
  INVALID_ARGUMENTS = 'invalid_arguments',
}

export class FilterError extends Error {
  code: ErrorCode;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FilterError';
    this.code = code;
    this.suggestion = suggestion;
    this.context = context;
  }
}

/*
 * Errors raised by Node's own modules may come from another realm (Jest runs
 * tests in a vm context), so these read properties instead of using instanceof.
 */

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
