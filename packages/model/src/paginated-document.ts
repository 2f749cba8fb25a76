/**
 * A word with its bounding box in page coordinates (top-left origin).
 * Words sharing a `lineId` were laid out on the same text line.
 */
export interface PositionedWord {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  text: string;
  lineId: number;
}

/**
 * Raw content of a single page as supplied by a document source.
 */
export interface PageContent {
  /** 0-based page index */
  index: number;
  /** Plain text of the page */
  text: string;
  /** Positioned words, when the source can provide them */
  words?: PositionedWord[];
}

/**
 * A document opened by a document source, ready for analysis.
 */
export interface PaginatedDocument {
  filename: string;
  pages: PageContent[];
}
