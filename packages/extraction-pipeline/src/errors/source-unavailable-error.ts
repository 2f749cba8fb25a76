/**
 * Error thrown when a document source cannot be opened at all.
 * The pipeline recovers from it by substituting a single empty page.
 */
export class SourceUnavailableError extends Error {
  public readonly name = 'SourceUnavailableError';

  constructor(
    public readonly sourceName: string,
    public readonly cause: unknown,
  ) {
    super(
      `Document source "${sourceName}" could not be opened: ` +
        (cause instanceof Error ? cause.message : String(cause)),
    );
  }
}
