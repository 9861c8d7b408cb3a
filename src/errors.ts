import type { PathKey } from "./path.js";

export type ChangeCacheErrorCode = "KEY_NOT_FOUND" | "TYPE_MISMATCH" | "INVALID_PATH";

export class ChangeCacheError extends Error {
  readonly code: ChangeCacheErrorCode;
  readonly path: string;

  constructor(code: ChangeCacheErrorCode, path: PathKey, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.path = path.toDotted();
  }
}

/**
 * The addressed key or index does not exist, or the node no longer sits
 * at its path in the session snapshot.
 */
export class KeyNotFoundError extends ChangeCacheError {
  constructor(path: PathKey, message = `Key not found: ${path.toDotted()}`) {
    super("KEY_NOT_FOUND", path, message);
  }
}

/**
 * A mapping operation on a sequence (or the reverse), an index out of
 * bounds, or a value that cannot be stored.
 */
export class TypeMismatchError extends ChangeCacheError {
  constructor(path: PathKey, message: string) {
    super("TYPE_MISMATCH", path, message);
  }
}

// Only raised when a diff cannot be expressed as dotted update fields
export class InvalidPathError extends ChangeCacheError {
  constructor(path: PathKey, message: string) {
    super("INVALID_PATH", path, message);
  }
}

export function isChangeCacheError(value: unknown): value is ChangeCacheError {
  return value instanceof ChangeCacheError;
}
