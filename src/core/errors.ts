export type TrieErrorCode = "NOT_FOUND" | "INVALID_ARGUMENT";

export class TrieError extends Error {
  constructor(
    readonly code: TrieErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The key's path is missing, or ends at a node that holds no value. */
export class NotFoundError extends TrieError {
  constructor(message = "key not found") {
    super("NOT_FOUND", message);
  }
}

export class InvalidArgumentError extends TrieError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export function isTrieError(e: unknown): e is TrieError {
  return e instanceof TrieError;
}
