/**
 * @tallyfold/extraction-pipeline
 *
 * Turns a paginated document into one reconstructed result of tables,
 * text sections and numeric values.
 *
 * ## Key Features
 *
 * - Page classification by numeric density and layout
 * - Grouping of contiguous numeric pages
 * - AI extraction per group with local failover
 * - Geometric table detection from positioned words
 * - Result reconstruction with page-level deduplication
 *
 * @packageDocumentation
 */

export { FailoverPipeline } from './core/failover-pipeline';
export type {
  FailoverPipelineOptions,
  PipelineStage,
  ProcessOptions,
} from './core/failover-pipeline';
export {
  GridLayoutSignal,
  NullLayoutSignal,
} from './analyzers/layout-signal';
export type { LayoutSignalProvider } from './analyzers/layout-signal';
export { PageComplexityAnalyzer } from './analyzers/page-complexity-analyzer';
export { NumberExtractor } from './processors/number-extractor';
export { GeometricTableDetector } from './processors/geometric-table-detector';
export type { GridRow, PageGrid } from './processors/geometric-table-detector';
export { AiFailoverRouter } from './processors/ai-failover-router';
export type {
  ClientCallOutcome,
  FallbackReason,
  GroupRouter,
  ProcessGroupsOptions,
} from './processors/ai-failover-router';
export {
  ResultReconstructor,
  averageQuality,
} from './processors/result-reconstructor';
export {
  buildLocalPage,
  buildSection,
  countWords,
} from './processors/section-builder';
export { LlmExtractionClient } from './clients/llm-extraction-client';
export type { LlmExtractionClientOptions } from './clients/llm-extraction-client';
export type {
  AiExtractionClient,
  AiExtractionResponse,
  AiExtractOptions,
  AiPagePayload,
  AiPageResponse,
} from './clients/ai-extraction-client';
export { normalizeAiResponse } from './validators/ai-response-normalizer';
export type {
  NormalizeOptions,
  NormalizedAiResponse,
} from './validators/ai-response-normalizer';
export {
  AiExtractionSchema,
  AiNumberSchema,
  AiSectionSchema,
  AiTableSchema,
} from './types/ai-extraction-schema';
export type {
  AiExtractionOutput,
  AiSectionOutput,
  AiTableOutput,
} from './types/ai-extraction-schema';
export {
  InMemoryDocumentSource,
  createEmptyDocument,
} from './sources/document-source';
export type { DocumentSource, InMemoryPage } from './sources/document-source';
export { PdfjsDocumentSource } from './sources/pdfjs-document-source';
export type { PdfjsDocumentSourceOptions } from './sources/pdfjs-document-source';
export { resolvePipelineConfig } from './config/pipeline-config';
export type {
  AnalyzerConfig,
  DetectorConfig,
  NumberExtractorConfig,
  PipelineConfig,
  PipelineConfigOverrides,
  RouterConfig,
} from './config/pipeline-config';
export {
  ANALYZER_DEFAULTS,
  DETECTOR_DEFAULTS,
  EXTRACTION_METHODS,
  LLM_CLIENT_DEFAULTS,
  NUMBER_EXTRACTOR_DEFAULTS,
  ROUTER_DEFAULTS,
} from './config/constants';
export {
  AI_EXTRACTION_MODELS,
  AI_MODEL_ENV,
  DEFAULT_AI_EXTRACTION_MODEL,
  createAiModelsFromEnv,
  resolveAiModelId,
} from './config/ai-models';
export type { AiModelPreset, AiModelSelection } from './config/ai-models';
export { createAbortError } from './errors/abort-error';
export { AiAdapterTimeoutError } from './errors/ai-adapter-timeout-error';
export { PipelineConfigError } from './errors/pipeline-config-error';
export { SourceUnavailableError } from './errors/source-unavailable-error';
