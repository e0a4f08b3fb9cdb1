export class StorageError extends Error {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Storage operation ${operation} failed: ${reason}`, { cause });
    this.name = 'StorageError';
  }
}
