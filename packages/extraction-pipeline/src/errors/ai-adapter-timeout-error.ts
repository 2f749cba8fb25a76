/**
 * Error raised when an AI extraction call exceeds its time budget.
 */
export class AiAdapterTimeoutError extends Error {
  public readonly name = 'AiAdapterTimeoutError';

  constructor(public readonly timeoutMs: number) {
    super(`AI extraction call timed out after ${timeoutMs}ms`);
  }
}
