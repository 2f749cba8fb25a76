import type { LanguageModel } from 'ai';

import { createAnthropic } from '@ai-sdk/anthropic';

/**
 * AI extraction model preset
 */
export interface AiModelPreset {
  /** Model identifier passed to the provider */
  modelId: string;
  /** Human-readable description */
  description: string;
}

/**
 * Environment variables read by {@link createAiModelsFromEnv}
 */
export const AI_MODEL_ENV = {
  API_KEY: 'ANTHROPIC_API_KEY',
  MODEL: 'TALLYFOLD_AI_MODEL',
  FALLBACK_MODEL: 'TALLYFOLD_AI_FALLBACK_MODEL',
} as const;

/**
 * Available extraction model presets. Any other value is passed to the
 * provider as a raw model id.
 */
export const AI_EXTRACTION_MODELS: Record<string, AiModelPreset> = {
  'anthropic/claude-sonnet-4-5': {
    modelId: 'claude-sonnet-4-5',
    description: 'Claude Sonnet 4.5 (balanced accuracy and cost)',
  },
  'anthropic/claude-haiku-4-5': {
    modelId: 'claude-haiku-4-5',
    description: 'Claude Haiku 4.5 (fast, cost-effective)',
  },
  'anthropic/claude-opus-4-1': {
    modelId: 'claude-opus-4-1',
    description: 'Claude Opus 4.1 (highest accuracy)',
  },
};

export const DEFAULT_AI_EXTRACTION_MODEL = 'anthropic/claude-sonnet-4-5';

/**
 * Resolve a preset key to its provider model id. Unknown keys are
 * treated as raw model ids.
 */
export function resolveAiModelId(model: string): string {
  return AI_EXTRACTION_MODELS[model]?.modelId ?? model;
}

/**
 * Models selected for AI extraction. Both are absent when no API key is
 * configured, which leaves every page group on local fallback.
 */
export interface AiModelSelection {
  model?: LanguageModel;
  fallbackModel?: LanguageModel;
}

/**
 * Build extraction models from environment variables.
 */
export function createAiModelsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): AiModelSelection {
  const apiKey = env[AI_MODEL_ENV.API_KEY];
  if (!apiKey) {
    return {};
  }

  const anthropic = createAnthropic({ apiKey });
  const modelKey = env[AI_MODEL_ENV.MODEL] || DEFAULT_AI_EXTRACTION_MODEL;
  const fallbackKey = env[AI_MODEL_ENV.FALLBACK_MODEL];

  return {
    model: anthropic(resolveAiModelId(modelKey)),
    fallbackModel: fallbackKey
      ? anthropic(resolveAiModelId(fallbackKey))
      : undefined,
  };
}
