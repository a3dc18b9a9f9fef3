import process from "node:process";

/** Environment map accepted by the configuration readers. */
export type ProcessEnv = typeof process.env;

/**
 * Errno-flavoured error raised by the `node:fs` APIs. Only the properties the
 * registry inspects are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown failure to an errno-flavoured error. */
export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error;
}

/** True when the failure reports a missing file or directory. */
export function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === "ENOENT";
}
