/**
 * A storage operation failed. Nothing was written.
 */
export class PersistenceError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(`Failed to ${operation}`, { cause });
    this.name = 'PersistenceError';
  }
}
