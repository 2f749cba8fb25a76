/**
 * Defaults for NumberExtractor
 */
export const NUMBER_EXTRACTOR_DEFAULTS = {
  /**
   * Characters of surrounding text captured on each side of a match
   */
  CONTEXT_WINDOW: 50,

  /**
   * Starting confidence before format and context adjustments
   */
  BASE_CONFIDENCE: 0.7,
} as const;

/**
 * Defaults for PageComplexityAnalyzer
 */
export const ANALYZER_DEFAULTS = {
  MIN_NUMBERS_PER_PAGE: 3,

  /**
   * Numbers per 1000 characters
   */
  MIN_NUMBER_DENSITY: 0.5,

  MIN_TABLE_LIKENESS_SCORE: 0.6,

  MAX_PAGES_PER_GROUP: 5,
} as const;

/**
 * Defaults for GeometricTableDetector
 */
export const DETECTOR_DEFAULTS = {
  MIN_ROWS: 3,
  MIN_COLS: 2,

  /**
   * Largest horizontal gap (page units) between words of the same cell
   */
  X_TOLERANCE: 6,

  /**
   * Confidence reported for every accepted table
   */
  CONFIDENCE: 0.6,

  /**
   * Minimum rows the pipeline asks for when detecting fallback tables
   */
  PIPELINE_MIN_ROWS: 2,
} as const;

/**
 * Defaults for AiFailoverRouter
 */
export const ROUTER_DEFAULTS = {
  ENABLED: true,
  USE_VISION_IF_AVAILABLE: true,
  MAX_CONCURRENT_GROUPS: 3,

  /**
   * Per-group AI call timeout in milliseconds
   */
  REQUEST_TIMEOUT_MS: 60000,

  /**
   * Characters of page text kept in a fallback section
   */
  MAX_SECTION_CHARS: 2000,

  /**
   * Quality score synthesized for AI responses without a summary
   */
  AI_QUALITY_SCORE: 0.6,

  /**
   * Quality score of local fallback output
   */
  FALLBACK_QUALITY_SCORE: 0.5,
} as const;

/**
 * Extraction method labels reported in document metadata
 */
export const EXTRACTION_METHODS = {
  ROUTING: 'ai_failover_routing',
  AI: 'ai_extraction',
  LOCAL_NUMBERS: 'local_number_extraction',
  GEOMETRIC_GRID: 'geometric_grid',
} as const;

/**
 * Defaults for LlmExtractionClient
 */
export const LLM_CLIENT_DEFAULTS = {
  /**
   * Transport retries per model, handled by the AI SDK
   */
  MAX_RETRIES: 3,

  TEMPERATURE: 0,

  /**
   * Confidence recorded on tables and numbers the model returns
   */
  TABLE_CONFIDENCE: 0.8,
  NUMBER_CONFIDENCE: 0.9,
} as const;
