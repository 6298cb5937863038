/**
 * Raised when a single-row lookup (by id or by name) matches nothing.
 * Collection queries never raise it; they return an empty array.
 */
export class NotFoundError extends Error {
  readonly entity: string;
  readonly key: string | number;

  constructor(entity: string, key: string | number) {
    super(`${entity} not found: ${key}`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.key = key;
  }
}

export function isNotFoundError(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError;
}
