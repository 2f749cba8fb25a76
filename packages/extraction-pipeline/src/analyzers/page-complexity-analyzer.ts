import type { LoggerMethods } from '@tallyfold/logger';
import type {
  PageCategory,
  PageGroup,
  PageMetric,
  PaginatedDocument,
} from '@tallyfold/model';

import type { AnalyzerConfig } from '../config/pipeline-config';
import type { NumberExtractor } from '../processors/number-extractor';
import type { LayoutSignalProvider } from './layout-signal';

import { BatchProcessor } from '@tallyfold/shared';

import { ANALYZER_DEFAULTS } from '../config/constants';
import { NullLayoutSignal } from './layout-signal';

const COMPLEX_CATEGORIES: ReadonlySet<PageCategory> = new Set([
  'numeric_text',
  'probable_table',
]);

/**
 * PageComplexityAnalyzer
 *
 * Classifies each page by numeric density and layout, then groups
 * contiguous complex pages into bounded runs for AI extraction.
 */
export class PageComplexityAnalyzer {
  private readonly config: AnalyzerConfig;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly numberExtractor: NumberExtractor,
    private readonly layoutSignal: LayoutSignalProvider = new NullLayoutSignal(),
    config: Partial<AnalyzerConfig> = {},
  ) {
    this.config = {
      minNumbersPerPage:
        config.minNumbersPerPage ?? ANALYZER_DEFAULTS.MIN_NUMBERS_PER_PAGE,
      minNumberDensity:
        config.minNumberDensity ?? ANALYZER_DEFAULTS.MIN_NUMBER_DENSITY,
      minTableLikenessScore:
        config.minTableLikenessScore ??
        ANALYZER_DEFAULTS.MIN_TABLE_LIKENESS_SCORE,
      maxPagesPerGroup:
        config.maxPagesPerGroup ?? ANALYZER_DEFAULTS.MAX_PAGES_PER_GROUP,
    };
  }

  analyzePages(document: PaginatedDocument): PageMetric[] {
    const metrics = document.pages.map((page): PageMetric => {
      const charCount = page.text.length;
      const numberCount = this.numberExtractor.extract(page.text).length;
      const numberDensity = (numberCount / Math.max(charCount, 1)) * 1000;
      const tableLikeness = this.layoutSignal.tableLikeness(page);

      return {
        pageIndex: page.index,
        numberCount,
        numberDensity,
        layoutSignals: { tableLikeness },
        textRatio: Math.max(charCount, 1) / Math.max(numberCount, 1),
        category: this.classify(numberCount, numberDensity, tableLikeness),
      };
    });

    const complex = metrics.filter((metric) =>
      COMPLEX_CATEGORIES.has(metric.category),
    ).length;
    this.logger.info(
      `[PageComplexityAnalyzer] Analyzed ${metrics.length} pages, ${complex} numeric`,
    );
    return metrics;
  }

  /**
   * Group contiguous complex pages. A simple page or a gap in page indices
   * closes the current run; each run is then split into chunks of at most
   * `maxPagesPerGroup` pages that never cross the run boundary.
   */
  groupNumericPages(metrics: readonly PageMetric[]): PageGroup[] {
    const groups: PageGroup[] = [];
    let run: number[] = [];

    const closeRun = (): void => {
      for (const chunk of BatchProcessor.createBatches(
        run,
        this.config.maxPagesPerGroup,
      )) {
        groups.push({ startPage: chunk[0], endPage: chunk[chunk.length - 1] });
      }
      run = [];
    };

    for (const metric of metrics) {
      if (!COMPLEX_CATEGORIES.has(metric.category)) {
        closeRun();
        continue;
      }
      if (run.length > 0 && metric.pageIndex !== run[run.length - 1] + 1) {
        closeRun();
      }
      run.push(metric.pageIndex);
    }
    closeRun();

    this.logger.debug(
      `[PageComplexityAnalyzer] Grouped numeric pages into ${groups.length} groups`,
    );
    return groups;
  }

  private classify(
    numberCount: number,
    numberDensity: number,
    tableLikeness: number,
  ): PageCategory {
    if (
      numberCount < this.config.minNumbersPerPage &&
      numberDensity < this.config.minNumberDensity
    ) {
      return 'none_or_low_numbers';
    }
    if (tableLikeness >= this.config.minTableLikenessScore) {
      return 'probable_table';
    }
    return 'numeric_text';
  }
}
