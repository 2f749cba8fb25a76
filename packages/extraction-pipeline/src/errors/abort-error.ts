/**
 * Create the error a cancelled operation rejects with.
 */
export function createAbortError(message: string): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}
