/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Node system error code (ENOENT, EXDEV, ...) if the value carries one
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Chain a cause's stack under the error's own stack
 */
export function appendCauseStack(error: Error, cause?: Error): void {
  if (cause) {
    error.stack = `${error.stack}\nCaused by: ${cause.stack}`;
  }
}
