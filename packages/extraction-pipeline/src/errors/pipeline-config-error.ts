/**
 * Error thrown when pipeline configuration fails validation.
 */
export class PipelineConfigError extends Error {
  public readonly name = 'PipelineConfigError';

  constructor(public readonly issues: string[]) {
    super(`Invalid pipeline configuration: ${issues.join('; ')}`);
  }
}
