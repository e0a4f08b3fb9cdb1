import { StorageError } from '@core/app';

const UNIQUE_CONSTRAINT_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

const readCode = (value: unknown): string | undefined => {
  if (value && typeof value === 'object' && 'code' in value) {
    const { code } = value;
    return typeof code === 'string' ? code : undefined;
  }

  return undefined;
};

/** Walks the cause chain looking for a SQLite unique or primary-key violation. */
export const isUniqueConstraintViolation = (error: unknown): boolean => {
  let current: unknown = error;

  for (let depth = 0; depth < 5 && current; depth += 1) {
    const code = readCode(current);
    if (code && UNIQUE_CONSTRAINT_CODES.has(code)) {
      return true;
    }

    current = current instanceof Error ? current.cause : undefined;
  }

  return false;
};

/**
 * Runs a storage call and rethrows driver failures as `StorageError`.
 * `translate` may map a failure to a domain error first.
 */
export const withStorageErrors = async <T>(
  operation: string,
  run: () => T | Promise<T>,
  translate?: (error: unknown) => Error | null,
): Promise<T> => {
  try {
    return await run();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }

    const translated = translate?.(error);
    if (translated) {
      throw translated;
    }

    throw new StorageError(operation, error);
  }
};
