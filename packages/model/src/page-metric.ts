/**
 * Page classification produced by the complexity analyzer.
 *
 * - `none_or_low_numbers`: handled by local heuristics only
 * - `numeric_text`: number-heavy prose, routed to AI extraction
 * - `probable_table`: number-heavy page with tabular layout, routed to AI extraction
 */
export type PageCategory =
  | 'none_or_low_numbers'
  | 'numeric_text'
  | 'probable_table';

/**
 * Layout signals computed for a page
 */
export interface LayoutSignals {
  /** How table-like the page layout is, in [0, 1] */
  tableLikeness: number;
}

/**
 * Per-page analysis metrics. Produced once per page and never mutated.
 *
 * @interface PageMetric
 */
export interface PageMetric {
  /** 0-based page index */
  readonly pageIndex: number;

  readonly numberCount: number;

  /** Numbers per 1000 characters */
  readonly numberDensity: number;

  readonly layoutSignals: Readonly<LayoutSignals>;

  /** Characters per number found (both floored at 1) */
  readonly textRatio: number;

  readonly category: PageCategory;
}

/**
 * Inclusive, 0-based range of contiguous complex pages routed together.
 */
export interface PageGroup {
  readonly startPage: number;
  readonly endPage: number;
}
