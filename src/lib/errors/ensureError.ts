/** Normalises any thrown value into an `Error`, keeping the original as `cause`. */
export const ensureError = (value: unknown, fallbackMessage = 'Unknown error'): Error => {
  if (value instanceof Error) {
    return value;
  }

  if (value && typeof value === 'object' && 'message' in value) {
    const { message } = value;
    return new Error(typeof message === 'string' ? message : fallbackMessage, { cause: value });
  }

  return new Error(typeof value === 'string' ? value : fallbackMessage, { cause: value });
};
