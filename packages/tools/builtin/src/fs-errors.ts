/**
 * Node filesystem error helpers
 */

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function isNotFound(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}
