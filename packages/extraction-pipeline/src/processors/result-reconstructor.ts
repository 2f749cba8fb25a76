import type { LoggerMethods } from '@tallyfold/logger';
import type {
  BatchResult,
  DocumentResult,
  PageResult,
  Table,
} from '@tallyfold/model';

import { ROUTER_DEFAULTS } from '../config/constants';

/**
 * ResultReconstructor
 *
 * Merges batch output, code-only pages and locally detected tables into
 * one document. Batch pages take precedence: a page number is claimed by
 * the first batch page that carries it, and code-only pages only fill
 * numbers nobody claimed.
 */
export class ResultReconstructor {
  constructor(private readonly logger: LoggerMethods) {}

  merge(
    batchResults: readonly BatchResult[],
    codeOnlyPages: readonly PageResult[],
    nativeTables: readonly Table[] = [],
  ): DocumentResult {
    const pageMap = new Map<number, PageResult>();

    for (const batch of batchResults) {
      for (const page of batch.pages) {
        if (!pageMap.has(page.pageNumber)) {
          pageMap.set(page.pageNumber, page);
        }
      }
    }
    for (const page of codeOnlyPages) {
      if (!pageMap.has(page.pageNumber)) {
        pageMap.set(page.pageNumber, page);
      }
    }

    const pages = [...pageMap.keys()]
      .sort((a, b) => a - b)
      .flatMap((pageNumber) => pageMap.get(pageNumber) ?? []);
    const tables = [
      ...nativeTables,
      ...batchResults.flatMap((batch) => batch.tables),
    ];
    const sections = pages.flatMap((page) => page.sections);

    this.logger.debug(
      `[ResultReconstructor] Merged ${pages.length} pages and ${tables.length} tables`,
    );

    return {
      documentMetadata: {
        filename: '',
        totalPages: pages.length,
        extractionMethods: [],
      },
      tables: { tables },
      textContent: { pages },
      processingSummary: {
        tablesExtracted: tables.length,
        textSections: sections.length,
        numbersFound: sections.reduce(
          (sum, section) => sum + section.numbers.length,
          0,
        ),
        overallQualityScore: averageQuality(batchResults),
        processingErrors: [],
      },
    };
  }
}

/**
 * Mean batch quality, or the fallback score when nothing was batched.
 */
export function averageQuality(batchResults: readonly BatchResult[]): number {
  if (batchResults.length === 0) {
    return ROUTER_DEFAULTS.FALLBACK_QUALITY_SCORE;
  }
  const total = batchResults.reduce(
    (sum, batch) => sum + batch.processingSummary.overallQualityScore,
    0,
  );
  return total / batchResults.length;
}
