import { type LanguageModel, NoObjectGeneratedError, generateObject } from 'ai';
import { z } from 'zod';

/**
 * Configuration for LLM API call with retry and fallback support
 */
export interface LLMCallConfig<TOutput> {
  /**
   * Zod schema the response must satisfy
   */
  schema: z.ZodType<TOutput>;

  /**
   * System prompt for LLM. The JSON schema of `schema` is appended to it.
   */
  systemPrompt: string;

  /**
   * User prompt for LLM
   */
  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once the primary model has failed (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum transport retry count per model, handled by the AI SDK
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'LlmExtractionClient')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'group-extraction')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface RawUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/**
 * Thrown when every attempt produced output that does not match the schema.
 */
export class StructuredOutputError extends Error {
  public readonly name = 'StructuredOutputError';

  constructor(
    public readonly component: string,
    public readonly issues: string[],
  ) {
    super(
      `[${component}] Model output did not match the expected schema: ${issues.join('; ')}`,
    );
  }
}

/**
 * LLMCaller - Centralized LLM API caller with schema validation and fallback
 *
 * Wraps AI SDK's generateObject in JSON mode:
 * 1. Ask the primary model for JSON, validate it against the Zod schema,
 *    and retry on schema mismatch
 * 2. If the primary model fails and a fallback model is provided, repeat
 *    with the fallback model
 * 3. Return usage data with model type indicator
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   schema: GroupExtractionSchema,
 *   systemPrompt: 'You extract tables from document pages',
 *   userPrompt: pagesText,
 *   primaryModel: anthropic('claude-sonnet-4-5'),
 *   maxRetries: 3,
 *   component: 'LlmExtractionClient',
 *   phase: 'group-extraction',
 * });
 * ```
 */
export class LLMCaller {
  /**
   * Additional attempts made when the output does not match the schema.
   */
  private static readonly MAX_SCHEMA_RETRIES = 2;

  private static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static buildUsage(
    config: Pick<LLMCallConfig<unknown>, 'component' | 'phase'>,
    modelName: string,
    usage: RawUsage | undefined,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
      totalTokens: usage?.totalTokens ?? 0,
    };
  }

  private static buildSystemPrompt(
    config: Pick<LLMCallConfig<unknown>, 'systemPrompt'> & {
      schema: z.ZodType;
    },
  ): string {
    const jsonSchema = z.toJSONSchema(config.schema, {
      io: 'input',
      unrepresentable: 'any',
    });
    return (
      `${config.systemPrompt}\n\n` +
      'Respond with a single JSON value that conforms to this JSON Schema:\n' +
      JSON.stringify(jsonSchema)
    );
  }

  /**
   * Generate JSON with one model and validate it, retrying on mismatch.
   * Usage is summed across attempts.
   */
  private static async generateValidated<TOutput>(
    model: LanguageModel,
    config: LLMCallConfig<TOutput>,
  ): Promise<{ output: TOutput; usage: RawUsage }> {
    const system = this.buildSystemPrompt(config);
    const usage = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
    let issues: string[] = [];

    for (let attempt = 0; attempt <= this.MAX_SCHEMA_RETRIES; attempt++) {
      let object: unknown;
      try {
        const response = await generateObject({
          model,
          output: 'no-schema',
          system,
          prompt: config.userPrompt,
          temperature: config.temperature,
          maxRetries: config.maxRetries,
          abortSignal: config.abortSignal,
        });
        usage.inputTokens += response.usage.inputTokens ?? 0;
        usage.outputTokens += response.usage.outputTokens ?? 0;
        usage.totalTokens += response.usage.totalTokens ?? 0;
        object = response.object;
      } catch (error) {
        if (NoObjectGeneratedError.isInstance(error)) {
          issues = [error.message];
          continue;
        }
        throw error;
      }

      const parsed = config.schema.safeParse(object);
      if (parsed.success) {
        return { output: parsed.data, usage };
      }
      issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
    }

    throw new StructuredOutputError(config.component, issues);
  }

  /**
   * Call LLM with schema validation and fallback support
   *
   * @throws the primary model's error when it fails and no fallback model is
   * configured, or when the call was aborted
   */
  static async call<TOutput>(
    config: LLMCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    const primaryModelName = this.extractModelName(config.primaryModel);

    try {
      const response = await this.generateValidated(
        config.primaryModel,
        config,
      );
      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          primaryModelName,
          response.usage,
          false,
        ),
        usedFallback: false,
      };
    } catch (primaryError) {
      // If aborted, don't try fallback - re-throw immediately
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw primaryError;
      }

      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await this.generateValidated(
        config.fallbackModel,
        config,
      );
      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          fallbackModelName,
          response.usage,
          true,
        ),
        usedFallback: true,
      };
    }
  }
}
