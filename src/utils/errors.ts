/**
 * Narrow an unknown error to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Whether an fs error means the path does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

/**
 * Message of an unknown thrown value, for logging.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
