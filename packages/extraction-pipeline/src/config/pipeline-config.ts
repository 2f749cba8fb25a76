import { z } from 'zod';

import { PipelineConfigError } from '../errors/pipeline-config-error';
import {
  ANALYZER_DEFAULTS,
  DETECTOR_DEFAULTS,
  NUMBER_EXTRACTOR_DEFAULTS,
  ROUTER_DEFAULTS,
} from './constants';

const analyzerConfigSchema = z.object({
  minNumbersPerPage: z
    .number()
    .int()
    .nonnegative()
    .default(ANALYZER_DEFAULTS.MIN_NUMBERS_PER_PAGE),
  minNumberDensity: z
    .number()
    .nonnegative()
    .default(ANALYZER_DEFAULTS.MIN_NUMBER_DENSITY),
  minTableLikenessScore: z
    .number()
    .min(0)
    .max(1)
    .default(ANALYZER_DEFAULTS.MIN_TABLE_LIKENESS_SCORE),
  maxPagesPerGroup: z
    .number()
    .int()
    .positive()
    .default(ANALYZER_DEFAULTS.MAX_PAGES_PER_GROUP),
});

const detectorConfigSchema = z.object({
  minRows: z.number().int().positive().default(DETECTOR_DEFAULTS.MIN_ROWS),
  minCols: z.number().int().positive().default(DETECTOR_DEFAULTS.MIN_COLS),
  xTolerance: z.number().nonnegative().default(DETECTOR_DEFAULTS.X_TOLERANCE),
});

const routerConfigSchema = z.object({
  enabled: z.boolean().default(ROUTER_DEFAULTS.ENABLED),
  useVisionIfAvailable: z
    .boolean()
    .default(ROUTER_DEFAULTS.USE_VISION_IF_AVAILABLE),
  maxConcurrentGroups: z
    .number()
    .int()
    .positive()
    .default(ROUTER_DEFAULTS.MAX_CONCURRENT_GROUPS),
  requestTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(ROUTER_DEFAULTS.REQUEST_TIMEOUT_MS),
  maxSectionChars: z
    .number()
    .int()
    .positive()
    .default(ROUTER_DEFAULTS.MAX_SECTION_CHARS),
});

const numberExtractorConfigSchema = z.object({
  contextWindow: z
    .number()
    .int()
    .nonnegative()
    .default(NUMBER_EXTRACTOR_DEFAULTS.CONTEXT_WINDOW),
});

/** Analyzer thresholds */
export type AnalyzerConfig = z.infer<typeof analyzerConfigSchema>;

/** Geometric table detector tolerances */
export type DetectorConfig = z.infer<typeof detectorConfigSchema>;

/** Failover router settings */
export type RouterConfig = z.infer<typeof routerConfigSchema>;

export type NumberExtractorConfig = z.infer<
  typeof numberExtractorConfigSchema
>;

/**
 * Complete, validated pipeline configuration
 */
export interface PipelineConfig {
  readonly analyzer: Readonly<AnalyzerConfig>;
  readonly detector: Readonly<DetectorConfig>;
  readonly router: Readonly<RouterConfig>;
  readonly numberExtractor: Readonly<NumberExtractorConfig>;
}

/**
 * Partial overrides accepted by {@link resolvePipelineConfig}
 */
export interface PipelineConfigOverrides {
  analyzer?: Partial<AnalyzerConfig>;
  detector?: Partial<DetectorConfig>;
  router?: Partial<RouterConfig>;
  numberExtractor?: Partial<NumberExtractorConfig>;
}

const pipelineConfigSchema = z.object({
  analyzer: analyzerConfigSchema.default({
    minNumbersPerPage: ANALYZER_DEFAULTS.MIN_NUMBERS_PER_PAGE,
    minNumberDensity: ANALYZER_DEFAULTS.MIN_NUMBER_DENSITY,
    minTableLikenessScore: ANALYZER_DEFAULTS.MIN_TABLE_LIKENESS_SCORE,
    maxPagesPerGroup: ANALYZER_DEFAULTS.MAX_PAGES_PER_GROUP,
  }),
  detector: detectorConfigSchema.default({
    minRows: DETECTOR_DEFAULTS.PIPELINE_MIN_ROWS,
    minCols: DETECTOR_DEFAULTS.MIN_COLS,
    xTolerance: DETECTOR_DEFAULTS.X_TOLERANCE,
  }),
  router: routerConfigSchema.default({
    enabled: ROUTER_DEFAULTS.ENABLED,
    useVisionIfAvailable: ROUTER_DEFAULTS.USE_VISION_IF_AVAILABLE,
    maxConcurrentGroups: ROUTER_DEFAULTS.MAX_CONCURRENT_GROUPS,
    requestTimeoutMs: ROUTER_DEFAULTS.REQUEST_TIMEOUT_MS,
    maxSectionChars: ROUTER_DEFAULTS.MAX_SECTION_CHARS,
  }),
  numberExtractor: numberExtractorConfigSchema.default({
    contextWindow: NUMBER_EXTRACTOR_DEFAULTS.CONTEXT_WINDOW,
  }),
});

/**
 * Merge overrides with defaults, validate, and freeze the result.
 *
 * The pipeline asks the table detector for 2 rows (instead of the
 * detector's own default of 3) unless `detector.minRows` is overridden.
 *
 * @throws PipelineConfigError when any value is out of range
 */
export function resolvePipelineConfig(
  overrides: PipelineConfigOverrides = {},
): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse({
    ...overrides,
    detector: overrides.detector && {
      minRows: DETECTOR_DEFAULTS.PIPELINE_MIN_ROWS,
      ...overrides.detector,
    },
  });

  if (!parsed.success) {
    throw new PipelineConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  const config = parsed.data;
  return Object.freeze({
    analyzer: Object.freeze(config.analyzer),
    detector: Object.freeze(config.detector),
    router: Object.freeze(config.router),
    numberExtractor: Object.freeze(config.numberExtractor),
  });
}
