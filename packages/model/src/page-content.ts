import type { NumberMatch } from './number-match';

/**
 * Unit of extracted text within a page
 *
 * Sections are built once and never mutated afterward.
 *
 * @interface Section
 */
export interface Section {
  /**
   * Identifier unique within its page (e.g. "p3_s1")
   */
  readonly sectionId: string;

  readonly sectionType: 'paragraph';

  readonly title: string | null;

  readonly content: string;

  readonly wordCount: number;

  /**
   * Whether the content is ready to be handed to a language model as-is
   */
  readonly llmReady: boolean;

  /**
   * Numbers found in the text the content was sliced from
   */
  readonly numbers: readonly NumberMatch[];
}

/**
 * Extracted content of one page
 *
 * @interface PageResult
 */
export interface PageResult {
  /**
   * 1-based page number
   */
  readonly pageNumber: number;

  readonly sections: readonly Section[];
}
