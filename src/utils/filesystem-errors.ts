// Filesystem error helpers

/**
 * Read the `code` of a Node filesystem error.
 *
 * Checked structurally rather than with `instanceof Error`: errors raised by
 * `fs` come from another realm under a VM-sandboxed runner such as Jest.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorCode(error) === 'ENOENT';
}
