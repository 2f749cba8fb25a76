import type { PageGroup } from './page-metric';
import type { PageResult } from './page-content';
import type { Table } from './table';

/**
 * Counters describing one batch or a whole document
 *
 * @interface ProcessingSummary
 */
export interface ProcessingSummary {
  tablesExtracted: number;
  textSections: number;
  numbersFound: number;
  /** Quality estimate in [0, 1] */
  overallQualityScore: number;
  processingErrors: string[];
}

/**
 * Output of the failover router for one page group
 *
 * `source` records whether the AI capability answered (`ai`) or the local
 * number extractor stood in for it (`fallback`).
 *
 * @interface BatchResult
 */
export interface BatchResult {
  group: PageGroup;
  source: 'ai' | 'fallback';
  tables: Table[];
  pages: PageResult[];
  processingSummary: ProcessingSummary;
  /** Why the group fell back to local extraction */
  fallbackReason?: string;
}

export interface DocumentMetadata {
  filename: string;
  totalPages: number;
  extractionMethods: string[];
}

/**
 * Final document model
 *
 * Pages are ordered by `pageNumber` and each number appears once. Tables list
 * locally detected tables first, then tables from AI or fallback batches.
 *
 * @interface DocumentResult
 */
export interface DocumentResult {
  documentMetadata: DocumentMetadata;
  tables: {
    tables: Table[];
  };
  textContent: {
    pages: PageResult[];
  };
  processingSummary: ProcessingSummary;
}
