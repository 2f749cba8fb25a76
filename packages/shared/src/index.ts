export { BatchProcessor } from './utils/batch-processor';
export {
  ConcurrentPool,
  type ConcurrentPoolOptions,
} from './utils/concurrent-pool';
export {
  LLMCaller,
  StructuredOutputError,
  type ExtendedTokenUsage,
  type LLMCallConfig,
  type LLMCallResult,
} from './utils/llm-caller';
