/**
 * Numeric literal formats recognized in page text.
 */
export type NumberFormat =
  | 'currency'
  | 'percentage'
  | 'decimal'
  | 'scientific_notation'
  | 'integer';

/**
 * A numeric literal found in extracted text
 *
 * Overlapping matches of different formats on the same substring are each
 * reported on their own; consumers that need one value per token dedupe.
 *
 * @interface NumberMatch
 */
export interface NumberMatch {
  /**
   * Parsed value. Tokens that fail to parse carry 0.
   */
  value: number;

  /**
   * Matched substring exactly as it appears in the text
   */
  originalText: string;

  /**
   * Window of text surrounding the match, taken from the same text as the
   * owning section's content
   */
  context: string;

  format: NumberFormat;

  /**
   * Heuristic confidence in [0, 1]
   */
  confidence: number;

  /**
   * ISO currency code for currency matches (e.g. "USD"), otherwise null
   */
  currency: string | null;

  /**
   * Unit inferred from format or context (e.g. "percent", "million")
   */
  unit: string | null;

  /**
   * Which extractor produced the match
   */
  extractionMethod: 'regex_pattern' | 'ai_extraction';
}
