import { describe, expect, test } from 'vitest';

import { PipelineConfigError } from '../errors/pipeline-config-error';
import { resolvePipelineConfig } from './pipeline-config';

describe('resolvePipelineConfig', () => {
  test('returns defaults when no overrides are given', () => {
    const config = resolvePipelineConfig();

    expect(config.analyzer).toEqual({
      minNumbersPerPage: 3,
      minNumberDensity: 0.5,
      minTableLikenessScore: 0.6,
      maxPagesPerGroup: 5,
    });
    expect(config.detector).toEqual({ minRows: 2, minCols: 2, xTolerance: 6 });
    expect(config.router).toEqual({
      enabled: true,
      useVisionIfAvailable: true,
      maxConcurrentGroups: 3,
      requestTimeoutMs: 60000,
      maxSectionChars: 2000,
    });
    expect(config.numberExtractor).toEqual({ contextWindow: 50 });
  });

  test('merges partial overrides with defaults', () => {
    const config = resolvePipelineConfig({
      analyzer: { maxPagesPerGroup: 2 },
      router: { enabled: false },
    });

    expect(config.analyzer.maxPagesPerGroup).toBe(2);
    expect(config.analyzer.minNumbersPerPage).toBe(3);
    expect(config.router.enabled).toBe(false);
    expect(config.router.maxConcurrentGroups).toBe(3);
  });

  test('keeps the pipeline row minimum when only tolerance is overridden', () => {
    const config = resolvePipelineConfig({ detector: { xTolerance: 10 } });

    expect(config.detector).toEqual({ minRows: 2, minCols: 2, xTolerance: 10 });
  });

  test('returns a frozen configuration', () => {
    const config = resolvePipelineConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.router)).toBe(true);
  });

  test('throws PipelineConfigError for out-of-range values', () => {
    expect(() =>
      resolvePipelineConfig({ analyzer: { maxPagesPerGroup: 0 } }),
    ).toThrow(PipelineConfigError);
  });

  test('reports the path of each invalid value', () => {
    try {
      resolvePipelineConfig({
        analyzer: { minTableLikenessScore: 2 },
        router: { requestTimeoutMs: -1 },
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PipelineConfigError);
      const issues = error instanceof PipelineConfigError ? error.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues[0].startsWith('analyzer.minTableLikenessScore: ')).toBe(
        true,
      );
      expect(issues[1].startsWith('router.requestTimeoutMs: ')).toBe(true);
    }
  });
});
